/**
 * Handlebars Template Renderer
 * Loads every template and include once, so rendering performs no I/O
 */

import Handlebars from "handlebars";
import { registerHelpers } from "./helpers";
import { TemplateNotFoundError, errorMessage } from "../utils/errors";
import { relativePath } from "../utils/storage-path";
import type { Logger } from "../utils/logger";
import type { SiteConfig, Storage, TemplateRenderer } from "../types";

export const TEMPLATE_PATTERN = "*.{html,hbs,handlebars}";

/**
 * Create an isolated Handlebars environment with the site helpers
 */
export function createTemplateEnvironment(): typeof Handlebars {
  const hb = Handlebars.create();
  registerHelpers(hb);
  return hb;
}

function stripExtension(path: string): string {
  return path.replace(/\.[^./]+$/, "");
}

export class HandlebarsRenderer implements TemplateRenderer {
  private hb = createTemplateEnvironment();
  private templates = new Map<string, HandlebarsTemplateDelegate>();

  constructor(private logger?: Logger) {}

  /**
   * Template keys available to `render`, sorted
   */
  keys(): string[] {
    return [...this.templates.keys()].sort();
  }

  async initialize(config: SiteConfig, storage: Storage): Promise<void> {
    this.hb = createTemplateEnvironment();
    this.templates.clear();

    // Includes become partials, addressable with or without their extension
    const includes = await storage.listFiles(config.includesDirectory, TEMPLATE_PATTERN, true);
    for (const path of includes) {
      const name = relativePath(config.includesDirectory, path);
      const source = await storage.readText(path);
      this.hb.registerPartial(name, source);
      this.hb.registerPartial(stripExtension(name), source);
    }

    const layouts = await storage.listFiles(config.templateDirectory, TEMPLATE_PATTERN, true);
    for (const path of layouts) {
      const key = relativePath(config.templateDirectory, path);
      const source = await storage.readText(path);

      try {
        // Parse now so syntax errors surface once, not on every render
        this.hb.parse(source);
        this.templates.set(key, this.hb.compile(source));
      } catch (error) {
        this.logger?.warn(`Skipping template ${path}: ${errorMessage(error)}`);
      }
    }

    this.logger?.debug(
      `Loaded ${this.templates.size} templates and ${includes.length} includes`,
    );
  }

  /**
   * Register a template from a string, e.g. a built-in default
   */
  registerTemplate(key: string, source: string): void {
    this.templates.set(key, this.hb.compile(source));
  }

  async render(templateKey: string, model: object): Promise<string> {
    const template = this.templates.get(templateKey);
    if (!template) {
      throw new TemplateNotFoundError(templateKey);
    }
    return template(model);
  }
}
