import { describe, it, expect, vi } from 'vitest';
import inquirer from 'inquirer';
import { InquirerPrompter, validateSiteOptions } from './prompts.js';

vi.mock('inquirer', () => ({
    default: {
        prompt: vi.fn(async () => ({ websiteName: 'MyFreshWebsite', githubUsername: 'octocat' }))
    }
}));

describe('validateSiteOptions', () => {
    it('should trim both answers', () => {
        expect(validateSiteOptions({ websiteName: '  MyFreshWebsite ', githubUsername: '\toctocat\n' })).toEqual({
            ok: true,
            options: { websiteName: 'MyFreshWebsite', githubUsername: 'octocat' }
        });
    });

    it('should reject an empty website name', () => {
        expect(validateSiteOptions({ websiteName: '', githubUsername: 'octocat' })).toEqual({
            ok: false,
            message: 'Website name is required'
        });
    });

    it.each(['a/b', '../x', 'nested\\site', '.', '..'])('should reject %s as a website name', websiteName => {
        expect(validateSiteOptions({ websiteName, githubUsername: 'octocat' })).toEqual({
            ok: false,
            message: 'Website name must be a plain directory name without path separators'
        });
    });

    it('should reject a whitespace-only GitHub username', () => {
        expect(validateSiteOptions({ websiteName: 'blog', githubUsername: '   ' })).toEqual({
            ok: false,
            message: 'GitHub username is required'
        });
    });
});

describe('InquirerPrompter', () => {
    it('should ask for the website name and then the GitHub username', async () => {
        const answers = await new InquirerPrompter().ask();

        expect(answers).toEqual({ websiteName: 'MyFreshWebsite', githubUsername: 'octocat' });
        expect(inquirer.prompt).toHaveBeenCalledWith([
            { type: 'input', name: 'websiteName', message: 'Website name:' },
            { type: 'input', name: 'githubUsername', message: 'GitHub username:' }
        ]);
    });
});
