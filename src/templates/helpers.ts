/**
 * Handlebars helpers available to every site template
 */

import type Handlebars from "handlebars";
import { slugify } from "../utils/slugify";
import { absoluteUrl } from "../utils/url";

type HandlebarsEnv = typeof Handlebars;

function toDate(value: unknown): Date | null {
  if (value instanceof Date) return value;
  if (typeof value === "string" || typeof value === "number") {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
  }
  return null;
}

/**
 * Format a date in UTC: "iso", "rfc822", "w3c", "long" or the default YYYY-MM-DD
 */
export function formatDate(value: unknown, format: string = "short"): string {
  const date = toDate(value);
  if (!date) return "";

  switch (format) {
    case "iso":
      return date.toISOString();
    case "rfc822":
      return date.toUTCString();
    case "w3c":
      return date.toISOString().replace(/\.\d{3}Z$/, "+00:00");
    case "long":
      return date.toLocaleDateString("en-US", {
        year: "numeric",
        month: "long",
        day: "numeric",
        timeZone: "UTC",
      });
    default:
      return date.toISOString().slice(0, 10);
  }
}

export function registerHelpers(hb: HandlebarsEnv): void {
  // Comparison helpers
  hb.registerHelper("eq", (a: unknown, b: unknown) => a === b);
  hb.registerHelper("ne", (a: unknown, b: unknown) => a !== b);
  hb.registerHelper("gt", (a: number, b: number) => a > b);
  hb.registerHelper("lt", (a: number, b: number) => a < b);
  hb.registerHelper("and", (a: unknown, b: unknown) => Boolean(a && b));
  hb.registerHelper("or", (a: unknown, b: unknown) => Boolean(a || b));
  hb.registerHelper("not", (a: unknown) => !a);

  // String helpers
  hb.registerHelper("slugify", (value: unknown) => slugify(String(value ?? "")));
  hb.registerHelper("absoluteUrl", (base: unknown, path: unknown) =>
    absoluteUrl(String(base ?? ""), String(path ?? "")),
  );

  // Usage: {{formatDate page.date "long"}}; the options hash is passed last
  hb.registerHelper("formatDate", (value: unknown, format: unknown) =>
    formatDate(value, typeof format === "string" ? format : undefined),
  );

  // Wraps raw markup for XML output; "]]>" inside the text is split
  hb.registerHelper("cdata", (value: unknown) => {
    const text = String(value ?? "").replace(/]]>/g, "]]]]><![CDATA[>");
    return new hb.SafeString(`<![CDATA[${text}]]>`);
  });
}
