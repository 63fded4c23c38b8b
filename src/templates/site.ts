import { stringify } from 'yaml';
import { THEME, buildBaseUrl } from '../utils/config.js';
import type { SiteOptions } from '../types/index.js';

export function quotedYaml(value: string): string {
    return stringify(value, { defaultStringType: 'QUOTE_DOUBLE', lineWidth: 0 }).trimEnd();
}

/**
 * Emits `value` as a plain scalar when it reads back as the same string,
 * otherwise double-quoted (`#blog`, `true`, `2024`, `a: b`).
 */
export function yamlScalar(value: string): string {
    const plain = stringify(value, { lineWidth: 0 }).trimEnd();
    return plain === value ? value : quotedYaml(value);
}

export function hugoConfigTemplate({ websiteName, githubUsername }: SiteOptions): string {
    return `baseURL: ${quotedYaml(buildBaseUrl(githubUsername, websiteName))}
languageCode: en-us
title: ${yamlScalar(websiteName)}
theme: ${THEME.name}

enableRobotsTXT: true

minify:
  disableXML: true
  minifyOutput: true

outputs:
  home:
    - HTML
    - RSS
    - JSON

menu:
  main:
    - identifier: home
      name: Home
      url: /
      weight: 10
    - identifier: archives
      name: Archive
      url: /archives/
      weight: 12
    - identifier: search
      name: Search
      url: /search/
      weight: 15
`;
}

export function archivesPageTemplate(): string {
    return `---
title: "Archive"
layout: "archives"
url: "/archives/"
summary: "archives"
---
`;
}

export function searchPageTemplate(): string {
    return `---
title: "Search"
layout: "search"
url: "/search/"
placeholder: "Search posts..."
summary: "search"
description: "Search the posts on this site"
---
`;
}

export function footerPartialTemplate(): string {
    return `{{- if not (.Param "hideFooter") }}
<footer class="footer">
    {{- if not site.Params.footer.hideCopyright }}
        {{- if site.Copyright }}
        <span>{{ site.Copyright | markdownify }}</span>
        {{- else }}
        <span>&copy; {{ now.Year }} <a href="{{ "" | absLangURL }}">{{ site.Title }}</a></span>
        {{- end }}
        {{- print " · " }}
    {{- end }}
    {{- with site.Params.footer.text }}
        {{ . | markdownify }}
        {{- print " · " }}
    {{- end }}
    <span>
        Powered by
        <a href="https://gohugo.io/" rel="noopener noreferrer" target="_blank">Hugo</a> &amp;
        <a href="https://github.com/adityatelange/hugo-PaperMod/" rel="noopener" target="_blank">PaperMod</a>
    </span>
</footer>
{{- end }}
`;
}
