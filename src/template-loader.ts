import fs from 'node:fs';
import path from 'node:path';

import {
  getDefaultLogger,
  parseLoaderOptions,
  type LoaderConfig,
  type LoaderOptions,
} from './config.js';

import type {
  Logger,
} from './logger.js';

import {
  TemplateNotFound,
} from './errors.js';

import {
  Template,
} from './template.js';

import {
  createIncludeFilter,
  type TemplateSource,
} from './template-stream-filters.js';

interface CachedTemplate {
  template: Template;
  filepath: string;
  mtimeMs: number;
}

const isRelativeName = (name: string): boolean => name.startsWith('./') || name.startsWith('../');

/**
 * Loads templates from the file system and caches them by name.
 *
 * Every loaded template gets the include filter installed, so
 * `<xi:include href="..."/>` resolves through the same loader.
 *
 * @example
 * ```ts
 * const loader = new TemplateLoader({ searchPath: [ 'templates' ] });
 * loader.load('page.xml').generate({ title: 'Home' }).render();
 * ```
 */
export class TemplateLoader implements TemplateSource {
  readonly config: Readonly<LoaderConfig>;
  readonly searchPath: readonly string[];
  private readonly logger: Logger;
  private readonly cache = new Map<string, CachedTemplate>();

  /**
   * @param options - Loader options.
   * @param logger - Logger for the loader and the templates it loads.
   * @throws TemplateConfigError on invalid options.
   */
  constructor (options: LoaderOptions = {}, logger?: Logger) {
    this.config = parseLoaderOptions(options);
    this.searchPath = this.config.searchPath;
    this.logger = logger ?? getDefaultLogger();
  }

  /**
   * Load a template.
   *
   * Names starting with `./` or `../` are resolved against the directory of
   * `relativeTo` when it is given; absolute names are used as they are;
   * anything else is looked up in each search path directory in turn.
   *
   * @param name - Template name.
   * @param relativeTo - Filename of the template referring to `name`.
   * @returns Cached or freshly parsed template.
   * @throws TemplateNotFound when no candidate file exists.
   */
  load (name: string, relativeTo?: string): Template {
    const key = (relativeTo !== undefined && isRelativeName(name))
      ? path.resolve(path.dirname(relativeTo), name)
      : path.normalize(name);

    const cached = this.cache.get(key);
    if (cached) {
      if (!this.config.autoReload) {
        this.logger.debug('Template cache hit', { name: key });
        return cached.template;
      }
      const stat = fs.statSync(cached.filepath, { throwIfNoEntry: false });
      if (stat && stat.mtimeMs === cached.mtimeMs) {
        this.logger.debug('Template cache hit', { name: key });
        return cached.template;
      }
      this.logger.debug('Template changed, reloading', { name: key, filepath: cached.filepath });
      this.cache.delete(key);
    }

    const candidates = path.isAbsolute(key)
      ? [ key ]
      : this.searchPath.map((dir) => path.join(dir, key));

    for (const filepath of candidates) {
      const stat = fs.statSync(filepath, { throwIfNoEntry: false });
      if (!stat || !stat.isFile()) continue;
      const source = fs.readFileSync(filepath, { encoding: this.config.encoding });
      const template = new Template(source, {
        filename: filepath,
        stripWhitespace: this.config.stripWhitespace,
        lookupErrors: this.config.lookupErrors,
      }, this.logger);
      template.preFilters.push(createIncludeFilter(this));
      this.cache.set(key, { template, filepath, mtimeMs: stat.mtimeMs });
      this.logger.debug('Template loaded', { name: key, filepath });
      return template;
    }

    throw new TemplateNotFound(name, this.searchPath);
  }

  /**
   * Forget all cached templates.
   */
  clear (): void {
    this.cache.clear();
  }
}
