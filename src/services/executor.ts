import { spawnSync } from 'child_process';
import type { CommandResult, ShellCommand } from '../types/index.js';

export interface CommandExecutor {
    run(command: ShellCommand): CommandResult;
}

export class CommandError extends Error {
    readonly command: ShellCommand;
    readonly exitCode: number;

    constructor(command: ShellCommand, result: CommandResult) {
        const expected = command.expectedExitCode ?? 0;
        const reason = result.error
            ? result.error.message
            : `exited with code ${result.exitCode}, expected ${expected}`;
        const detail = result.stderr.trim();
        super(`\`${formatCommand(command)}\` ${reason}${detail ? `: ${detail}` : ''}`);
        this.name = 'CommandError';
        this.command = command;
        this.exitCode = result.exitCode;
    }
}

export function formatCommand(command: ShellCommand): string {
    return [command.command, ...command.args].join(' ');
}

export function succeeded(command: ShellCommand, result: CommandResult): boolean {
    return !result.error && result.exitCode === (command.expectedExitCode ?? 0);
}

/**
 * Runs the command and throws a CommandError unless it exits with the expected code.
 */
export function runChecked(executor: CommandExecutor, command: ShellCommand): CommandResult {
    const result = executor.run(command);
    if (!succeeded(command, result)) {
        throw new CommandError(command, result);
    }
    return result;
}

export class ProcessExecutor implements CommandExecutor {
    run(command: ShellCommand): CommandResult {
        const stdio = command.stdio ?? 'inherit';
        const child = spawnSync(command.command, command.args, {
            cwd: command.cwd,
            stdio,
            encoding: 'utf-8'
        });

        // status is null when the binary could not be spawned or was killed by a signal
        return {
            exitCode: child.status ?? -1,
            stdout: typeof child.stdout === 'string' ? child.stdout : '',
            stderr: typeof child.stderr === 'string' ? child.stderr : '',
            error: child.error
        };
    }
}
