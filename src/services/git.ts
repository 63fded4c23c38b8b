import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { logger } from '../utils/logger.js';
import { DEFAULT_BRANCH } from '../utils/config.js';

export interface VersionControl {
    init(): Promise<void>;
    commitAll(message: string): Promise<void>;
    addSubmodule(repository: string, path: string): Promise<void>;
    updateSubmodules(): Promise<void>;
}

export class GitService implements VersionControl {
    private git: SimpleGit;

    constructor(workingDir: string = process.cwd(), options: Partial<SimpleGitOptions> = {}) {
        this.git = simpleGit({ ...options, baseDir: workingDir });
    }

    async init(): Promise<void> {
        const spinner = logger.spinner('⚙️  Initializing git repository...');

        try {
            await this.git.init();
            // HEAD is unborn, so this only picks the branch the first commit lands on
            await this.git.raw(['symbolic-ref', 'HEAD', `refs/heads/${DEFAULT_BRANCH}`]);
            spinner.succeed(`✅ Git repository initialized on ${DEFAULT_BRANCH}`);
        } catch (error) {
            spinner.fail('Failed to initialize git repository');
            throw error;
        }
    }

    async commitAll(message: string): Promise<void> {
        const spinner = logger.spinner('📁 Adding files...');

        try {
            await this.git.add('.');

            spinner.text = '💾 Creating commit...';
            await this.git.commit(message);

            spinner.succeed(`✅ Committed: "${message}"`);
        } catch (error) {
            spinner.fail('Failed to commit changes');
            throw error;
        }
    }

    async addSubmodule(repository: string, path: string): Promise<void> {
        const spinner = logger.spinner(`🎨 Adding theme submodule: ${path}`);

        try {
            await this.git.raw(['submodule', 'add', '--depth=1', repository, path]);
            spinner.succeed(`✅ Submodule added: ${path}`);
        } catch (error) {
            spinner.fail('Failed to add theme submodule');
            throw error;
        }
    }

    async updateSubmodules(): Promise<void> {
        const spinner = logger.spinner('⬇️  Fetching submodules...');

        try {
            await this.git.submoduleUpdate(['--init', '--recursive']);
            spinner.succeed('✅ Submodules up to date');
        } catch (error) {
            spinner.fail('Failed to update submodules');
            throw error;
        }
    }
}
