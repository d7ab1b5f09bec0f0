import { Injectable, Logger } from '@nestjs/common';
import { format } from 'date-fns';

const PLACEHOLDER_FORMATS: ReadonlyMap<string, string> = new Map([
  ['YYYY', 'yyyy'],
  ['YY', 'yy'],
  ['MM', 'MM'],
  ['DD', 'dd'],
  ['HH', 'HH'],
  ['mm', 'mm'],
  ['SS', 'ss'],
]);

const PLACEHOLDER_PATTERN = /\{([^{}]*)\}/g;

/**
 * Expands date placeholders in a collection's destination template.
 */
@Injectable()
export class DownloadPathResolver {
  private readonly logger = new Logger(DownloadPathResolver.name);

  /**
   * An unknown placeholder leaves the whole template literal.
   */
  resolve(template: string, now: Date = new Date()): string {
    const unknown = [...template.matchAll(PLACEHOLDER_PATTERN)]
      .map((match) => match[1])
      .filter((name) => !PLACEHOLDER_FORMATS.has(name));

    if (unknown.length > 0) {
      this.logger.warn(
        `Unknown placeholder(s) ${unknown.map((name) => `{${name}}`).join(', ')} in path template "${template}", using it verbatim`,
      );
      return template;
    }

    return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => {
      const pattern = PLACEHOLDER_FORMATS.get(name);
      return pattern === undefined ? match : format(now, pattern);
    });
  }
}
