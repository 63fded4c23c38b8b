import { existsSync } from 'fs';
import { join } from 'path';
import { logger } from '../utils/logger.js';
import { runChecked, type CommandExecutor } from './executor.js';

export class HugoScaffolder {
    private executor: CommandExecutor;

    constructor(executor: CommandExecutor) {
        this.executor = executor;
    }

    createSite(name: string, parentDir: string): string {
        const spinner = logger.spinner(`🏗️  Creating Hugo site: ${name}`);
        const siteDir = join(parentDir, name);

        try {
            runChecked(this.executor, {
                command: 'hugo',
                args: ['new', 'site', name, '--format', 'yaml'],
                cwd: parentDir,
                stdio: 'pipe'
            });

            if (!existsSync(siteDir)) {
                throw new Error(`hugo reported success but ${siteDir} was not created`);
            }

            spinner.succeed(`✅ Hugo site created: ${siteDir}`);
            return siteDir;
        } catch (error) {
            spinner.fail('Failed to create Hugo site');
            throw error;
        }
    }
}
