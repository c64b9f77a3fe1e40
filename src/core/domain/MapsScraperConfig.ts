/**
 * MapsScraperConfig - maps.yaml 설정 스키마
 *
 * SOLID 원칙:
 * - SRP: 설정 스키마 정의만 담당
 * - OCP: 네비게이션 액션은 discriminated union으로 확장
 */

import { z } from "zod";
import { FEED_COLLECTOR_DEFAULTS, PARSER_DEFAULTS } from "../../config/constants";

/**
 * 네비게이션 단계 스키마
 * 문자열 값에는 ${query} 템플릿 변수 사용 가능
 */
export const NavigationStepSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("navigate"),
    url: z.string(),
    waitUntil: z.enum(["load", "domcontentloaded", "networkidle", "commit"]).default("domcontentloaded"),
    timeout: z.number().int().positive().optional(),
    optional: z.boolean().default(false),
  }),
  z.object({
    action: z.literal("click"),
    selector: z.string(),
    timeout: z.number().int().positive().optional(),
    optional: z.boolean().default(false),
  }),
  z.object({
    action: z.literal("fill"),
    selector: z.string(),
    value: z.string(),
    timeout: z.number().int().positive().optional(),
    optional: z.boolean().default(false),
  }),
  z.object({
    action: z.literal("press"),
    selector: z.string(),
    key: z.string(),
    timeout: z.number().int().positive().optional(),
    optional: z.boolean().default(false),
  }),
  z.object({
    action: z.literal("wait"),
    duration: z.number().int().nonnegative(),
    optional: z.boolean().default(false),
  }),
]);

export type NavigationStep = z.infer<typeof NavigationStepSchema>;

/**
 * 브라우저 설정
 */
export const BrowserSettingsSchema = z.object({
  headless: z.boolean().default(false),
  args: z.array(z.string()).optional(),
  viewport: z
    .object({
      width: z.number().int().positive(),
      height: z.number().int().positive(),
    })
    .default({ width: 1366, height: 900 }),
  locale: z.string().default("en-US"),
  userAgent: z.string().optional(),
});

export type BrowserSettings = z.infer<typeof BrowserSettingsSchema>;

/**
 * 셀렉터 설정
 */
export const SelectorSettingsSchema = z.object({
  feed: z.string(),
  resultItem: z.string(),
  endOfList: z.string(),
  name: z.string(),
  ratingLabel: z.string(),
  infoFragment: z.string(),
  website: z.string(),
});

export type SelectorSettings = z.infer<typeof SelectorSettingsSchema>;

/**
 * 대기 시간 설정
 */
export const TimeoutSettingsSchema = z.object({
  navigationMs: z.number().int().positive().default(30000),
  feedVisibleMs: z.number().int().positive().default(60000),
  endMarkerMs: z.number().int().positive().default(1000),
});

/**
 * Feed 수집 설정
 */
export const FeedCollectorSettingsSchema = z.object({
  maxAttempts: z.number().int().positive().default(FEED_COLLECTOR_DEFAULTS.MAX_ATTEMPTS),
  stallThreshold: z.number().int().positive().default(FEED_COLLECTOR_DEFAULTS.STALL_THRESHOLD),
  settleDelayMs: z.number().int().nonnegative().default(FEED_COLLECTOR_DEFAULTS.SETTLE_DELAY_MS),
  stallBackoffBaseMs: z.number().int().nonnegative().default(FEED_COLLECTOR_DEFAULTS.STALL_BACKOFF_BASE_MS),
  stallBackoffStepMs: z.number().int().nonnegative().default(FEED_COLLECTOR_DEFAULTS.STALL_BACKOFF_STEP_MS),
  retriggerSettleMs: z.number().int().nonnegative().default(FEED_COLLECTOR_DEFAULTS.RETRIGGER_SETTLE_MS),
});

/**
 * 파서 설정
 */
export const ParserSettingsSchema = z.object({
  separator: z.string().min(1).default(PARSER_DEFAULTS.SEPARATOR),
  minAddressLength: z.number().int().nonnegative().default(PARSER_DEFAULTS.MIN_ADDRESS_LENGTH),
  placeTypes: z.array(z.string().min(1)).min(1).optional(),
  statusKeywords: z.array(z.string().min(1)).optional(),
});

/**
 * 전체 설정
 */
export const MapsScraperConfigSchema = z.object({
  site: z.object({
    name: z.string(),
    baseUrl: z.string().url(),
  }),
  browser: BrowserSettingsSchema.default({}),
  navigation: z.array(NavigationStepSchema).min(1),
  selectors: SelectorSettingsSchema,
  timeouts: TimeoutSettingsSchema.default({}),
  feedCollector: FeedCollectorSettingsSchema.default({}),
  parser: ParserSettingsSchema.default({}),
});

export type MapsScraperConfig = z.infer<typeof MapsScraperConfigSchema>;
