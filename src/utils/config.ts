import type { PlatformProfile } from '../types/index.js';

export const THEME = {
    name: 'PaperMod',
    repository: 'https://github.com/adityatelange/hugo-PaperMod.git',
    path: 'themes/PaperMod'
} as const;

export const COMMIT_MESSAGES = {
    scaffold: 'Initial Hugo site',
    content: 'Add PaperMod config, archives and search pages',
    workflow: 'Add footer partial and GitHub Pages deploy workflow'
} as const;

export const SITE_FILES = {
    config: 'hugo.yaml',
    contentDir: 'content',
    archives: 'content/archives.md',
    search: 'content/search.md',
    partialsDir: 'layouts/partials',
    footer: 'layouts/partials/footer.html',
    workflowsDir: '.github/workflows',
    workflow: '.github/workflows/deploy.yml'
} as const;

export const DEFAULT_BRANCH = 'main';

const PLATFORM_PROFILES: Partial<Record<NodeJS.Platform, PlatformProfile>> = {
    win32: {
        lookupCommand: 'where',
        packageManager: {
            command: 'choco',
            displayName: 'Chocolatey',
            installHint: 'Install Chocolatey from https://chocolatey.org/install, then re-run this command in an elevated shell.',
            packages: { hugo: 'hugo-extended', git: 'git' }
        }
    },
    linux: {
        lookupCommand: 'which',
        packageManager: {
            command: 'apt-get',
            displayName: 'APT',
            installHint: 'apt-get ships with Debian and Ubuntu; on other distributions install hugo and git with your own package manager first.',
            packages: { hugo: 'hugo', git: 'git' }
        }
    }
};

export function resolvePlatformProfile(platform: NodeJS.Platform = process.platform): PlatformProfile | undefined {
    return PLATFORM_PROFILES[platform];
}

export function buildBaseUrl(githubUsername: string, websiteName: string): string {
    return `https://${githubUsername}.github.io/${websiteName}/`;
}
