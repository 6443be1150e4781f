/**
 * Audit Command
 *
 * Reports the raw values the normalizers target, without changing them.
 *
 * Usage:
 *   osm-tabular audit <file> [options]
 *
 * Options:
 *   -c, --category <name...>  street | pharmacy | county | phone | postcode (default: all)
 *   --json                    Output as JSON
 */

import { Option, type Command } from 'commander';
import { formatAuditReport, runAudit } from '../../../audit/report.js';
import { AUDIT_CATEGORIES, type AuditCategory } from '../../../audit/reporters.js';
import { readOsmElements } from '../../../ingestion/osm-reader.js';
import { EXIT_CODES, exitCodeForError, resolveRules, type CommandContext, type ExitCode } from '../../context.js';
import { formatJson } from '../../lib/output.js';

/**
 * Audit options from CLI
 */
export interface AuditOptions {
  readonly categories?: readonly AuditCategory[];
  readonly json?: boolean;
}

function isAuditCategory(value: unknown): value is AuditCategory {
  return AUDIT_CATEGORIES.some((category) => category === value);
}

/**
 * Register the audit command
 */
export function registerAuditCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('audit')
    .description('Report street types, pharmacy names, counties, phones and postcodes as found')
    .argument('<file>', 'OSM XML file')
    .addOption(new Option('-c, --category <name...>', 'Categories to report').choices([...AUDIT_CATEGORIES]))
    .option('--json', 'Output as JSON')
    .action(async (file: string, raw: Record<string, unknown>) => {
      const options: AuditOptions = {
        categories: Array.isArray(raw.category) ? raw.category.filter(isAuditCategory) : undefined,
        json: raw.json === true ? true : undefined,
      };
      process.exitCode = await executeAudit(file, options, getContext());
    });
}

/**
 * Execute the audit command
 */
export async function executeAudit(file: string, options: AuditOptions, context: CommandContext): Promise<ExitCode> {
  const { logger } = context;
  const categories = options.categories ?? AUDIT_CATEGORIES;
  const json = options.json ?? logger.json;

  logger.commandStart('audit', { file, categories });

  try {
    const rules = resolveRules(context.config);
    const report = await runAudit(readOsmElements(file, { kinds: ['node', 'way'] }), categories, {
      expectedStreetTypes: rules.street.expectedTypes,
    });

    context.print(json ? formatJson(report) : formatAuditReport(report));
    logger.commandEnd(true);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.commandEnd(false);
    return exitCodeForError(error);
  }
}
