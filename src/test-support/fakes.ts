import { existsSync } from 'fs';
import { join } from 'path';
import { resolvePlatformProfile, SITE_FILES } from '../utils/config.js';
import type { CommandExecutor } from '../services/executor.js';
import type { VersionControl } from '../services/git.js';
import type { ProcessDirectory } from '../services/working-directory.js';
import type { CommandResult, PlatformProfile, ShellCommand } from '../types/index.js';

export const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' });
export const exit = (exitCode: number, stderr = ''): CommandResult => ({ exitCode, stdout: '', stderr });

export class FakeExecutor implements CommandExecutor {
    readonly calls: ShellCommand[] = [];
    private respond: (command: ShellCommand) => CommandResult;

    constructor(respond: (command: ShellCommand) => CommandResult = () => ok()) {
        this.respond = respond;
    }

    run(command: ShellCommand): CommandResult {
        this.calls.push(command);
        return this.respond(command);
    }

    commandLines(): string[] {
        return this.calls.map(call => [call.command, ...call.args].join(' '));
    }
}

export class FakeProcess implements ProcessDirectory {
    readonly visited: string[] = [];
    private dir: string;

    constructor(dir: string) {
        this.dir = dir;
    }

    cwd(): string {
        return this.dir;
    }

    chdir(directory: string): void {
        this.visited.push(directory);
        this.dir = directory;
    }
}

const TRACKED_FILES = [
    SITE_FILES.config,
    SITE_FILES.archives,
    SITE_FILES.search,
    SITE_FILES.footer,
    SITE_FILES.workflow
];

export interface RecordedCommit {
    message: string;
    present: string[];
}

export class FakeVersionControl implements VersionControl {
    readonly operations: string[] = [];
    readonly commits: RecordedCommit[] = [];
    failOnCommit?: string;
    private siteDir: string;

    constructor(siteDir: string) {
        this.siteDir = siteDir;
    }

    async init(): Promise<void> {
        this.operations.push('init');
    }

    async commitAll(message: string): Promise<void> {
        if (message === this.failOnCommit) {
            throw new Error(`commit failed: ${message}`);
        }
        this.operations.push(`commit ${message}`);
        this.commits.push({
            message,
            present: TRACKED_FILES.filter(file => existsSync(join(this.siteDir, file)))
        });
    }

    async addSubmodule(repository: string, path: string): Promise<void> {
        this.operations.push(`submodule add ${repository} ${path}`);
    }

    async updateSubmodules(): Promise<void> {
        this.operations.push('submodule update');
    }
}

export function profileFor(platform: NodeJS.Platform): PlatformProfile {
    const profile = resolvePlatformProfile(platform);
    if (!profile) {
        throw new Error(`no profile for ${platform}`);
    }
    return profile;
}
