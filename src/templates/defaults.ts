/**
 * Built-in templates for generated XML files
 */

export const SITEMAP_TEMPLATE = `<?xml version="1.0" encoding="utf-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
{{#each entries}}
  <url>
    <loc>{{loc}}</loc>
    <lastmod>{{formatDate lastmod "w3c"}}</lastmod>
    <changefreq>{{changefreq}}</changefreq>
    <priority>{{priority}}</priority>
  </url>
{{/each}}
</urlset>
`;

export const RSS_TEMPLATE = `<?xml version="1.0" encoding="utf-8"?>
<rss version="2.0">
  <channel>
    <title>{{title}}</title>
    <link>{{link}}</link>
    <description>{{description}}</description>
    <language>{{language}}</language>
    <lastBuildDate>{{formatDate lastBuildDate "rfc822"}}</lastBuildDate>
    <generator>sitesmith</generator>
{{#each items}}
    <item>
      <title>{{title}}</title>
      <link>{{link}}</link>
      <description>{{cdata description}}</description>
      <pubDate>{{formatDate pubDate "rfc822"}}</pubDate>
      <guid isPermaLink="true">{{link}}</guid>
{{#each categories}}
      <category>{{this}}</category>
{{/each}}
{{#if author}}
      <author>{{author}}</author>
{{/if}}
    </item>
{{/each}}
  </channel>
</rss>
`;
