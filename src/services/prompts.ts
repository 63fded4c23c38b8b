import inquirer from 'inquirer';
import type { SiteAnswers, SiteOptions } from '../types/index.js';

export interface SitePrompter {
    ask(): Promise<SiteAnswers>;
}

export class InquirerPrompter implements SitePrompter {
    async ask(): Promise<SiteAnswers> {
        // no `validate`: an empty answer aborts the run instead of re-prompting
        return inquirer.prompt<SiteAnswers>([
            {
                type: 'input',
                name: 'websiteName',
                message: 'Website name:'
            },
            {
                type: 'input',
                name: 'githubUsername',
                message: 'GitHub username:'
            }
        ]);
    }
}

export type SiteOptionsCheck = { ok: true; options: SiteOptions } | { ok: false; message: string };

export function validateSiteOptions(answers: SiteAnswers): SiteOptionsCheck {
    const websiteName = answers.websiteName.trim();
    const githubUsername = answers.githubUsername.trim();

    if (!websiteName) {
        return { ok: false, message: 'Website name is required' };
    }
    if (/[\\/]/.test(websiteName) || websiteName === '.' || websiteName === '..') {
        return { ok: false, message: 'Website name must be a plain directory name without path separators' };
    }
    if (!githubUsername) {
        return { ok: false, message: 'GitHub username is required' };
    }

    return { ok: true, options: { websiteName, githubUsername } };
}
