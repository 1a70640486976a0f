/**
 * Ingest a directory of statute PDFs
 *
 * Usage:
 *   npm run ingest -- <dir> --country egypt --law-type criminal
 *
 * The law name is taken from each file name. Exits non-zero when any file fails.
 */

import { readdir, readFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { getEnv } from '../config/env.js';
import { isLawType, isSupportedCountry, type SupportedCountry } from '../config/jurisdictions.js';
import { createContainer } from '../container.js';
import type { IngestionResult } from '../pipelines/ingestion/types.js';
import { logger } from '../utils/logger.js';

interface IngestDirectoryOptions {
  directory: string;
  country: SupportedCountry;
  lawType: string;
}

interface FileOutcome {
  file: string;
  result?: IngestionResult;
  error?: string;
}

/**
 * Parse command line arguments
 */
function parseArgs(args: string[]): IngestDirectoryOptions {
  let directory: string | undefined;
  let country: string | undefined;
  let lawType: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--country' && i + 1 < args.length) {
      country = args[++i];
    } else if (arg === '--law-type' && i + 1 < args.length) {
      lawType = args[++i];
    } else if (!arg.startsWith('--')) {
      directory = arg;
    }
  }

  if (!directory || !country || !lawType) {
    throw new Error('Usage: ingest-directory <dir> --country <country> --law-type <lawType>');
  }
  if (!isSupportedCountry(country)) {
    throw new Error(`Unsupported country: ${country}`);
  }
  if (!isLawType(lawType)) {
    throw new Error(`Unsupported law type: ${lawType}`);
  }
  return { directory, country, lawType };
}

/** "قانون_العقوبات.pdf" -> "قانون العقوبات" */
function lawNameFromFile(file: string): string {
  return basename(file, extname(file)).replace(/[_-]+/g, ' ').trim();
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const entries = await readdir(options.directory);
  const files = entries.filter((entry) => extname(entry).toLowerCase() === '.pdf').sort();

  if (files.length === 0) {
    logger.warn({ directory: options.directory }, 'No PDF files found');
    return;
  }

  const container = createContainer(getEnv());
  const outcomes: FileOutcome[] = [];

  try {
    for (const file of files) {
      try {
        const pdf = await readFile(join(options.directory, file));
        const result = await container.ingestionPipeline.ingest(pdf, {
          country: options.country,
          lawType: options.lawType,
          lawName: lawNameFromFile(file),
          sourceFile: file,
        });
        outcomes.push({ file, result });
        logger.info(
          {
            file,
            success: result.success,
            articles: result.articlesFound,
            chunks: result.chunksCreated,
            errors: result.errors,
          },
          result.success ? 'File ingested' : 'File ingestion failed'
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        outcomes.push({ file, error: message });
        logger.error({ file, error: message }, 'File ingestion failed');
      }
    }
  } finally {
    await container.close();
  }

  const failed = outcomes.filter((outcome) => outcome.error !== undefined || !outcome.result?.success);
  logger.info({ total: outcomes.length, failed: failed.length }, 'Directory ingestion finished');
  if (failed.length > 0) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Directory ingestion failed');
  process.exit(1);
});
