export type ManagedTool = 'hugo' | 'git';

export interface SiteOptions {
    websiteName: string;
    githubUsername: string;
}

// Raw prompt answers; SiteOptions is the trimmed, validated form.
export type SiteAnswers = {
    websiteName: string;
    githubUsername: string;
};

export type StdioMode = 'inherit' | 'ignore' | 'pipe';

export interface ShellCommand {
    command: string;
    args: string[];
    expectedExitCode?: number;
    cwd?: string;
    stdio?: StdioMode;
}

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    error?: Error;
}

export interface PackageManagerProfile {
    command: string;
    displayName: string;
    installHint: string;
    packages: Record<ManagedTool, string>;
}

export interface PlatformProfile {
    lookupCommand: 'where' | 'which';
    packageManager: PackageManagerProfile;
}

export type ProvisionStage = 'privileges' | 'tools' | 'input' | 'collision';

export type ProvisionResult =
    | { status: 'success'; siteDir: string }
    | { status: 'aborted'; stage: ProvisionStage; message: string }
    | { status: 'failed'; message: string };
