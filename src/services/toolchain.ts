import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { formatCommand, succeeded, type CommandExecutor } from './executor.js';
import type { ManagedTool, PlatformProfile, ShellCommand } from '../types/index.js';

export type ToolCheck = { ok: true } | { ok: false; message: string };

export interface ToolchainOptions {
    executor: CommandExecutor;
    profile: PlatformProfile;
    platform?: NodeJS.Platform;
    getuid?: () => number;
}

export class Toolchain {
    private executor: CommandExecutor;
    private profile: PlatformProfile;
    private platform: NodeJS.Platform;
    private getuid?: () => number;

    constructor(options: ToolchainOptions) {
        this.executor = options.executor;
        this.profile = options.profile;
        this.platform = options.platform ?? process.platform;
        this.getuid = options.getuid ?? process.getuid?.bind(process);
    }

    isElevated(): boolean {
        if (this.platform === 'win32') {
            // `net session` is refused outside an administrator shell
            const command: ShellCommand = { command: 'net', args: ['session'], stdio: 'ignore' };
            return succeeded(command, this.executor.run(command));
        }
        return this.getuid?.() === 0;
    }

    isAvailable(binary: string): boolean {
        const command: ShellCommand = {
            command: this.profile.lookupCommand,
            args: [binary],
            stdio: 'ignore'
        };
        return succeeded(command, this.executor.run(command));
    }

    checkPackageManager(): ToolCheck {
        const { command, displayName, installHint } = this.profile.packageManager;

        if (this.isAvailable(command)) {
            logger.success(`${displayName} found`);
            return { ok: true };
        }

        return {
            ok: false,
            message: `${displayName} (${command}) is not installed. ${installHint}`
        };
    }

    ensureTool(tool: ManagedTool): ToolCheck {
        if (this.isAvailable(tool)) {
            logger.success(`${tool} found`);
            return { ok: true };
        }

        const { command, packages } = this.profile.packageManager;
        const install: ShellCommand = {
            command,
            args: ['install', packages[tool], '-y']
        };

        logger.warn(`${tool} not found, installing with ${chalk.cyan(formatCommand(install))}`);
        const result = this.executor.run(install);

        if (!succeeded(install, result)) {
            const reason = result.error ? result.error.message : `exited with code ${result.exitCode}`;
            return { ok: false, message: `Failed to install ${tool} (\`${formatCommand(install)}\` ${reason})` };
        }

        if (!this.isAvailable(tool)) {
            return { ok: false, message: `${tool} is still not on PATH after installation. Open a new shell and try again.` };
        }

        logger.success(`${tool} installed`);
        return { ok: true };
    }
}
