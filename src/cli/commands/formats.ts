/**
 * Formats command
 * Lists supported document formats and whether their parsers load
 */

import { Command } from 'commander';
import { createAnalyzerRegistry } from '../../analyzers/registry.js';
import { printHeader, printTable, printWarning } from '../output.js';

export function createFormatsCommand(): Command {
  return new Command('formats')
    .description('List supported document formats and analyzer availability')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const registry = await createAnalyzerRegistry();
      const formats = await registry.describe();

      if (options.json) {
        console.log(JSON.stringify(formats, null, 2));
        return;
      }

      printHeader('Supported Formats');
      printTable(
        ['Extension', 'Format', 'Library', 'Status'],
        formats.map((entry) => [
          entry.tag,
          entry.format,
          entry.library ?? 'built-in',
          entry.available ? 'available' : 'unavailable',
        ])
      );

      const missing = formats.filter((entry) => !entry.available);
      if (missing.length > 0) {
        console.log();
        printWarning(`${missing.length} format(s) will be reported as unsupported until their library is installed`);
      }
    });
}
