/**
 * Sass Compiler
 * Compiles SCSS with imports resolved through a Storage backend, so the
 * same stylesheet builds from local disk or an object store
 */

import * as sass from "sass";
import { normalizePath } from "../utils/storage-path";
import type { AssetCompiler, Storage, StyleOutputStyle } from "../types";

const SCHEME = "storage:";

function toUrl(path: string): URL {
  return new URL(`${SCHEME}/${encodeURI(normalizePath(path))}`);
}

function toPath(url: URL): string {
  return normalizePath(decodeURIComponent(url.pathname));
}

function dirName(path: string): string {
  const index = path.lastIndexOf("/");
  return index === -1 ? "" : path.slice(0, index);
}

/**
 * Files a Sass load of `path` may refer to, in lookup order
 */
export function candidatePaths(path: string): string[] {
  const dir = dirName(path);
  const base = path.slice(dir ? dir.length + 1 : 0);
  const join = (name: string) => (dir ? `${dir}/${name}` : name);

  if (/\.(scss|sass|css)$/.test(base)) {
    return [path, join(`_${base}`)];
  }

  return [
    join(`_${base}.scss`),
    join(`${base}.scss`),
    join(`_${base}.sass`),
    join(`${base}.sass`),
    `${path}/_index.scss`,
    `${path}/index.scss`,
    join(`${base}.css`),
  ];
}

function syntaxFor(path: string): sass.Syntax {
  if (path.endsWith(".css")) return "css";
  if (path.endsWith(".sass")) return "indented";
  return "scss";
}

/**
 * Importer resolving loads against `storage`, relative to the importing file
 */
export function createStorageImporter(storage: Storage, entryPath: string): sass.Importer<"async"> {
  return {
    async canonicalize(url, context) {
      let path: string;
      if (url.startsWith(SCHEME)) {
        path = toPath(new URL(url));
      } else {
        const from = context.containingUrl?.protocol === SCHEME
          ? toPath(context.containingUrl)
          : entryPath;
        path = normalizePath(`${dirName(from)}/${url}`);
      }

      for (const candidate of candidatePaths(path)) {
        if (await storage.exists(candidate)) {
          return toUrl(candidate);
        }
      }
      return null;
    },

    async load(canonicalUrl) {
      const path = toPath(canonicalUrl);
      return {
        contents: await storage.readText(path),
        syntax: syntaxFor(path),
      };
    },
  };
}

export class SassCompiler implements AssetCompiler {
  async compile(
    source: string,
    sourcePath: string,
    storage: Storage,
    outputStyle: StyleOutputStyle,
  ): Promise<string> {
    const importer = createStorageImporter(storage, sourcePath);
    const result = await sass.compileStringAsync(source, {
      url: toUrl(sourcePath),
      importer,
      syntax: syntaxFor(sourcePath),
      style: outputStyle,
    });
    return result.css;
  }
}
