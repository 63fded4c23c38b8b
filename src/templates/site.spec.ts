import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { archivesPageTemplate, footerPartialTemplate, hugoConfigTemplate, searchPageTemplate } from './site.js';

describe('hugoConfigTemplate', () => {
    const lines = hugoConfigTemplate({ websiteName: 'MyFreshWebsite', githubUsername: 'octocat' }).split('\n');

    it('should build the GitHub Pages base URL and title', () => {
        expect(lines[0]).toBe('baseURL: "https://octocat.github.io/MyFreshWebsite/"');
        expect(lines).toContain('title: MyFreshWebsite');
        expect(lines).toContain('theme: PaperMod');
    });

    it('should enable robots.txt and minification', () => {
        expect(lines).toContain('enableRobotsTXT: true');
        expect(lines).toContain('  disableXML: true');
        expect(lines).toContain('  minifyOutput: true');
    });

    it('should weight the home, archive and search menu entries', () => {
        const menu = lines.slice(lines.indexOf('menu:'));

        expect(menu).toEqual([
            'menu:',
            '  main:',
            '    - identifier: home',
            '      name: Home',
            '      url: /',
            '      weight: 10',
            '    - identifier: archives',
            '      name: Archive',
            '      url: /archives/',
            '      weight: 12',
            '    - identifier: search',
            '      name: Search',
            '      url: /search/',
            '      weight: 15',
            ''
        ]);
    });
});

describe('hugoConfigTemplate with names YAML would misread', () => {
    const render = (websiteName: string) => hugoConfigTemplate({ websiteName, githubUsername: 'octocat' });

    it.each(['My Blog: Notes', '#blog', 'Say "hi"', 'true', '2024'])('should read %s back as the title', name => {
        const config = parse(render(name));

        expect(config.title).toBe(name);
        expect(config.baseURL).toBe(`https://octocat.github.io/${name}/`);
    });

    it('should double-quote names that are not safe as plain scalars', () => {
        expect(render('My Blog: Notes').split('\n')).toContain('title: "My Blog: Notes"');
        expect(render('#blog').split('\n')).toContain('title: "#blog"');
        expect(render('true').split('\n')).toContain('title: "true"');
        expect(render('2024').split('\n')).toContain('title: "2024"');
    });

    it('should escape double quotes in the title and base URL', () => {
        const lines = render('Say "hi"').split('\n');

        expect(lines[0]).toBe('baseURL: "https://octocat.github.io/Say \\"hi\\"/"');
        expect(lines).toContain('title: "Say \\"hi\\""');
    });

    it('should keep plain names unquoted', () => {
        expect(render('my-site_2.0').split('\n')).toContain('title: my-site_2.0');
    });
});

describe('content pages', () => {
    it('should give the archive page the archives layout', () => {
        expect(archivesPageTemplate()).toBe(
            '---\ntitle: "Archive"\nlayout: "archives"\nurl: "/archives/"\nsummary: "archives"\n---\n'
        );
    });

    it('should give the search page a placeholder and description', () => {
        expect(searchPageTemplate().split('\n')).toEqual([
            '---',
            'title: "Search"',
            'layout: "search"',
            'url: "/search/"',
            'placeholder: "Search posts..."',
            'summary: "search"',
            'description: "Search the posts on this site"',
            '---',
            ''
        ]);
    });
});

describe('footerPartialTemplate', () => {
    it('should be wrapped in the hideFooter guard', () => {
        const lines = footerPartialTemplate().split('\n');

        expect(lines[0]).toBe('{{- if not (.Param "hideFooter") }}');
        expect(lines[lines.length - 2]).toBe('{{- end }}');
        expect(lines).toContain('        <span>{{ site.Copyright | markdownify }}</span>');
    });
});
