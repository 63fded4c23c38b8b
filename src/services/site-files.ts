import { writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../utils/logger.js';
import { SITE_FILES } from '../utils/config.js';
import {
    archivesPageTemplate,
    footerPartialTemplate,
    hugoConfigTemplate,
    searchPageTemplate
} from '../templates/site.js';
import type { SiteOptions } from '../types/index.js';

export class SiteFileWriter {
    private siteDir: string;

    constructor(siteDir: string) {
        this.siteDir = siteDir;
    }

    // Replaces whatever default `hugo new site` generated.
    writeConfig(options: SiteOptions): void {
        this.write('📝 Writing hugo.yaml...', SITE_FILES.config, hugoConfigTemplate(options));
    }

    writeContentPages(): void {
        const spinner = logger.spinner('📄 Creating archives and search pages...');

        try {
            mkdirSync(join(this.siteDir, SITE_FILES.contentDir), { recursive: true });
            writeFileSync(join(this.siteDir, SITE_FILES.archives), archivesPageTemplate());
            writeFileSync(join(this.siteDir, SITE_FILES.search), searchPageTemplate());
            spinner.succeed(`✅ Created ${SITE_FILES.archives} and ${SITE_FILES.search}`);
        } catch (error) {
            spinner.fail('Failed to create content pages');
            throw error;
        }
    }

    writeFooterPartial(): void {
        mkdirSync(join(this.siteDir, SITE_FILES.partialsDir), { recursive: true });
        this.write('🧩 Writing footer partial...', SITE_FILES.footer, footerPartialTemplate());
    }

    private write(text: string, relativePath: string, content: string): void {
        const spinner = logger.spinner(text);

        try {
            writeFileSync(join(this.siteDir, relativePath), content);
            spinner.succeed(`✅ Created ${relativePath}`);
        } catch (error) {
            spinner.fail(`Failed to write ${relativePath}`);
            throw error;
        }
    }
}
