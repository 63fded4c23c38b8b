import figlet from 'figlet';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { resolvePlatformProfile } from '../utils/config.js';
import { ProcessExecutor } from '../services/executor.js';
import { Toolchain } from '../services/toolchain.js';
import { InquirerPrompter } from '../services/prompts.js';
import { HugoScaffolder } from '../services/scaffold.js';
import { GitService } from '../services/git.js';
import { WorkingDirectory } from '../services/working-directory.js';
import { provisionSite } from '../services/provisioner.js';

export async function createCommand(): Promise<void> {
    console.log('\n');
    console.log(
        chalk.cyan.bold(
            figlet.textSync('LAUNCHPAD', {
                font: 'Slant',
                horizontalLayout: 'default'
            })
        )
    );
    console.log(chalk.gray('  🚀 Hugo + PaperMod sites on GitHub Pages'));
    console.log(chalk.gray('  ━'.repeat(25)));
    console.log('\n');

    const profile = resolvePlatformProfile();
    if (!profile) {
        logger.error(`Unsupported platform: ${process.platform}. Supported: Windows (Chocolatey), Linux (apt-get).`);
        process.exitCode = 1;
        return;
    }

    const executor = new ProcessExecutor();
    const result = await provisionSite({
        toolchain: new Toolchain({ executor, profile }),
        prompter: new InquirerPrompter(),
        scaffolder: new HugoScaffolder(executor),
        createVersionControl: (siteDir) => new GitService(siteDir),
        workingDirectory: new WorkingDirectory()
    });

    if (result.status !== 'success') {
        process.exitCode = 1;
    }
}
