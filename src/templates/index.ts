/**
 * Template rendering
 */

export { HandlebarsRenderer, createTemplateEnvironment } from "./renderer";
export { registerHelpers, formatDate } from "./helpers";
export { SITEMAP_TEMPLATE, RSS_TEMPLATE } from "./defaults";
