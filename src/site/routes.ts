import path from "path";

/**
 * Location of a generated page: directory segments plus a file name
 */
export class RoutePath {
  constructor(
    readonly directories: readonly string[],
    readonly file: string
  ) {}

  /** Absolute URL path, e.g. `/wiki/Lua/Test_Table.html` */
  urlPath(): string {
    return `/${[...this.directories, this.file].join("/")}`;
  }

  /** Path of the page on disk below `root` */
  filePath(root: string): string {
    return path.join(root, ...this.directories, this.file);
  }
}

/**
 * Route of the page with the given title: spaces become underscores and
 * `/` separates sub-pages, all below the wiki directory
 */
export function pageTitleToRoutePath(title: string, wikiDirectory = "wiki"): RoutePath {
  const segments = title.trim().replace(/ /g, "_").split("/");
  const page = segments.pop() ?? "";
  const directories = [wikiDirectory, ...segments].filter((segment) => segment !== "");
  return new RoutePath(directories, `${page}.html`);
}
