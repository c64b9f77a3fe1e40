#!/usr/bin/env node
/**
 * Maps Listing Scraper CLI
 *
 * 사용법:
 *   maps-scraper "<검색어>"
 *
 * 예시:
 *   maps-scraper "italian restaurants in london"
 *   OUTPUT_FORMAT=json maps-scraper "cafes in paris"
 *
 * 환경변수:
 *   - OUTPUT_FORMAT (table | lines | json, 기본 table)
 *   - MAPS_CONFIG_PATH, HEADLESS
 *   - LOG_LEVEL, LOG_PRETTY, LOG_TO_FILE
 *
 * stdout: 결과만 출력 / 로그는 stderr
 */

import "dotenv/config";

import { ConfigLoader } from "./config/ConfigLoader";
import { OUTPUT_CONFIG } from "./config/constants";
import { logger } from "./config/logger";
import type { MapsScraperConfig } from "./core/domain/MapsScraperConfig";
import { toErrorMessage } from "./core/interfaces/ScraperErrorType";
import { MapsSearchService, SearchSessionResult } from "./services/MapsSearchService";
import { OutputFormat, OutputFormatSchema, ResultFormatter } from "./utils/ResultFormatter";

export const USAGE = 'Usage: maps-scraper "<search query>"';
export const NO_DATA_MESSAGE = "No data was extracted.";

/**
 * 출력 대상 (테스트에서 교체)
 */
export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

export interface SearchRunner {
  search(query: string): Promise<SearchSessionResult>;
}

export interface CliOptions {
  io?: CliIO;
  format?: string;
  loadConfig?: () => MapsScraperConfig;
  createRunner?: (config: MapsScraperConfig) => SearchRunner;
}

const defaultIO: CliIO = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

/**
 * 출력 포맷 결정 (잘못된 값은 table)
 */
export function resolveOutputFormat(raw: string): OutputFormat {
  const parsed = OutputFormatSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    logger.warn({ format: raw }, "알 수 없는 OUTPUT_FORMAT - table 사용");
    return "table";
  }
  return parsed.data;
}

/**
 * CLI 진입점
 * @returns 종료 코드
 */
export async function main(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? defaultIO;

  if (argv.length !== 1) {
    io.err(USAGE);
    return 1;
  }

  const [query] = argv;
  const format = resolveOutputFormat(options.format ?? OUTPUT_CONFIG.FORMAT);

  let config: MapsScraperConfig;
  try {
    config = options.loadConfig ? options.loadConfig() : ConfigLoader.getInstance().loadConfig();
  } catch (error) {
    io.err(`Configuration error: ${toErrorMessage(error)}`);
    return 1;
  }

  const runner = options.createRunner
    ? options.createRunner(config)
    : new MapsSearchService(config);
  const result = await runner.search(query);

  if (result.records.length === 0) {
    io.out(NO_DATA_MESSAGE);
    return 0;
  }

  io.out(ResultFormatter.format(result.records, format));
  if (format !== "json") {
    io.out(`\n${ResultFormatter.formatSummary(result.records.length)}`);
  }
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.fatal({ error: toErrorMessage(error) }, "CLI 실행 실패");
      process.exitCode = 1;
    });
}
