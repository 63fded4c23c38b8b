import { existsSync } from 'fs';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { COMMIT_MESSAGES, THEME, buildBaseUrl } from '../utils/config.js';
import { validateSiteOptions, type SitePrompter } from './prompts.js';
import { SiteFileWriter } from './site-files.js';
import { DeployWorkflowGenerator } from './cicd.js';
import type { Toolchain } from './toolchain.js';
import type { HugoScaffolder } from './scaffold.js';
import type { VersionControl } from './git.js';
import type { WorkingDirectory } from './working-directory.js';
import type { ManagedTool, ProvisionResult, ProvisionStage, SiteOptions } from '../types/index.js';

export interface ProvisionDependencies {
    toolchain: Toolchain;
    prompter: SitePrompter;
    scaffolder: HugoScaffolder;
    createVersionControl: (siteDir: string) => VersionControl;
    workingDirectory: WorkingDirectory;
}

const MANAGED_TOOLS: ManagedTool[] = ['hugo', 'git'];

export const PROVISION_STEPS = [
    'Checking prerequisites',
    'Site details',
    'Creating the Hugo site',
    'Adding theme, pages and deploy workflow'
] as const;

function announce(step: (typeof PROVISION_STEPS)[number]): void {
    logger.step(PROVISION_STEPS.indexOf(step) + 1, PROVISION_STEPS.length, step);
}

function abort(stage: ProvisionStage, message: string): ProvisionResult {
    logger.error(message);
    return { status: 'aborted', stage, message };
}

export async function provisionSite(deps: ProvisionDependencies): Promise<ProvisionResult> {
    const { toolchain, prompter, scaffolder, createVersionControl, workingDirectory } = deps;

    try {
        announce('Checking prerequisites');
        if (!toolchain.isElevated()) {
            return abort('privileges', 'Administrator privileges are required to install software. Re-run this command from an elevated shell.');
        }

        const packageManager = toolchain.checkPackageManager();
        if (!packageManager.ok) {
            return abort('tools', packageManager.message);
        }

        for (const tool of MANAGED_TOOLS) {
            const check = toolchain.ensureTool(tool);
            if (!check.ok) {
                return abort('tools', check.message);
            }
        }

        announce('Site details');
        const input = validateSiteOptions(await prompter.ask());
        if (!input.ok) {
            return abort('input', input.message);
        }
        const options = input.options;

        if (existsSync(workingDirectory.resolve(options.websiteName))) {
            return abort('collision', `A file or directory named "${options.websiteName}" already exists in ${workingDirectory.path}`);
        }

        announce('Creating the Hugo site');
        const siteDir = scaffolder.createSite(options.websiteName, workingDirectory.path);
        workingDirectory.enter(siteDir);

        const vcs = createVersionControl(siteDir);
        await vcs.init();
        await vcs.commitAll(COMMIT_MESSAGES.scaffold);

        announce('Adding theme, pages and deploy workflow');
        await vcs.addSubmodule(THEME.repository, THEME.path);
        await vcs.updateSubmodules();

        const files = new SiteFileWriter(siteDir);
        files.writeConfig(options);
        files.writeContentPages();
        await vcs.commitAll(COMMIT_MESSAGES.content);

        files.writeFooterPartial();
        new DeployWorkflowGenerator(siteDir).generate();
        await vcs.commitAll(COMMIT_MESSAGES.workflow);

        printSummary(options, siteDir);
        return { status: 'success', siteDir };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(message || 'An error occurred');
        return { status: 'failed', message };
    } finally {
        try {
            workingDirectory.restore();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Could not return to ${workingDirectory.origin}: ${message}`);
        }
    }
}

export function printSummary({ websiteName, githubUsername }: SiteOptions, siteDir: string): void {
    const repoUrl = `https://github.com/${githubUsername}/${websiteName}`;

    console.log('\n');
    logger.success('🎉 All done! Your Hugo site is ready.\n');

    console.log(chalk.gray('  📁 Site directory:'));
    console.log(chalk.cyan.bold(`     ${siteDir}\n`));

    console.log(chalk.gray('  Next steps:'));
    console.log(chalk.gray('   1. Create an empty repository: ') + chalk.cyan(repoUrl));
    console.log(chalk.gray('   2. Push the site:'));
    console.log(chalk.cyan(`        cd ${websiteName}`));
    console.log(chalk.cyan(`        git remote add origin ${repoUrl}.git`));
    console.log(chalk.cyan('        git push -u origin main'));
    console.log(chalk.gray('   3. In Settings → Pages, serve from the ') + chalk.cyan('gh-pages') + chalk.gray(' branch'));
    console.log(chalk.gray('   4. Preview locally: ') + chalk.cyan('hugo server -D'));
    console.log('');
    console.log(chalk.gray('  🚀 Live site (after the first deploy):'));
    console.log(chalk.magenta.bold(`     ${buildBaseUrl(githubUsername, websiteName)}\n`));
}
