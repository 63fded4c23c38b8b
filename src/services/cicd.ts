import { writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../utils/logger.js';
import { DEFAULT_BRANCH, SITE_FILES } from '../utils/config.js';

export class DeployWorkflowGenerator {
    private siteDir: string;

    constructor(siteDir: string) {
        this.siteDir = siteDir;
    }

    generate(): string {
        const spinner = logger.spinner('⚙️  Generating GitHub Pages workflow...');

        try {
            mkdirSync(join(this.siteDir, SITE_FILES.workflowsDir), { recursive: true });

            const target = join(this.siteDir, SITE_FILES.workflow);
            writeFileSync(target, this.generateHugoPagesWorkflow());
            spinner.succeed(`✅ Workflow created: ${SITE_FILES.workflow}`);
            return target;
        } catch (error) {
            spinner.fail('Failed to generate GitHub Pages workflow');
            throw error;
        }
    }

    private generateHugoPagesWorkflow(): string {
        return `name: Deploy Hugo site to GitHub Pages

on:
  push:
    branches:
      - ${DEFAULT_BRANCH}

jobs:
  build-deploy:
    runs-on: ubuntu-latest

    steps:
      - name: Checkout repo
        uses: actions/checkout@v4
        with:
          submodules: true
          fetch-depth: 0

      - name: Setup Hugo
        uses: peaceiris/actions-hugo@v3
        with:
          hugo-version: 'latest'
          extended: true

      - name: Build
        run: hugo --minify

      - name: Deploy to GitHub Pages
        uses: peaceiris/actions-gh-pages@v4
        with:
          github_token: $\{{ secrets.GITHUB_TOKEN }}
          publish_dir: ./public
          publish_branch: gh-pages
`;
    }
}
