/**
 * 리스팅 필드 파서
 *
 * RawListingBundle 1개 → ListingRecord 1개 (또는 이름이 없으면 null)
 *
 * 역할:
 * - 이름 정규화 및 누락 시 폐기
 * - info 텍스트 추출 파이프라인 실행
 * - 별점 라벨 힌트 / 웹사이트 반영
 * - 필드 교차 검증 (type ≠ address, 숫자 전용 값 제거)
 */

import { z } from "zod";
import type { Logger } from "../../config/logger";
import { NOT_AVAILABLE } from "../../config/constants";
import {
  ExtractedField,
  ListingRecord,
  RawListingBundle,
} from "../../core/domain/Listing";
import { createComponentLogger } from "../../utils/LoggerContext";
import { createInitialState, ExtractionStage } from "./ExtractionState";
import {
  createExtractionPipeline,
  ExtractionPipelineOptions,
  runExtractionPipeline,
} from "./ExtractionPipeline";
import { isSentinel, normalizeText } from "./TextNormalizer";

const RATING_HINT_PATTERN = /^\d\.\d$/;
const REVIEWS_HINT_PATTERN = /^\((?:\d{1,3}(?:[,.]\d{3})+|\d+)\)$/;
const NUMERIC_ONLY = /^\d+$/;

/**
 * 웹사이트: http(s) 절대 URL만 허용
 */
const WebsiteSchema = z
  .string()
  .url()
  .refine((url) => /^https?:\/\//i.test(url));

/**
 * 값 → 값 또는 "N/A"
 */
function orSentinel(value: string | null | undefined): string {
  return value === null || value === undefined || isSentinel(value) ? NOT_AVAILABLE : value;
}

/**
 * 힌트 값 검증 (정규화 후 패턴 일치 시에만 채택)
 */
function acceptHint(hint: string | null | undefined, pattern: RegExp): string | undefined {
  const normalized = normalizeText(hint);
  return pattern.test(normalized) ? normalized : undefined;
}

/**
 * 웹사이트 정규화
 */
export function normalizeWebsite(url: string | null | undefined): string {
  const normalized = normalizeText(url);
  return WebsiteSchema.safeParse(normalized).success ? normalized : NOT_AVAILABLE;
}

/**
 * type/address 검증: 빈 값, "N/A", 숫자 전용 → "N/A"
 */
function sanitizeTextField(value: string): string {
  return isSentinel(value) || NUMERIC_ONLY.test(value) ? NOT_AVAILABLE : value;
}

/**
 * 추출 결과 + 힌트 → 최종 레코드 (불변)
 */
export function finalizeRecord(
  name: string,
  fields: Readonly<Partial<Record<ExtractedField, string>>>,
  bundle: Pick<RawListingBundle, "ratingHint" | "reviewsHint" | "websiteUrl">,
): ListingRecord {
  let type = sanitizeTextField(orSentinel(fields.type));
  const address = sanitizeTextField(orSentinel(fields.address));

  if (type === address) {
    type = NOT_AVAILABLE;
  }

  return Object.freeze({
    name,
    rating: orSentinel(fields.rating ?? acceptHint(bundle.ratingHint, RATING_HINT_PATTERN)),
    reviews: orSentinel(fields.reviews ?? acceptHint(bundle.reviewsHint, REVIEWS_HINT_PATTERN)),
    price: orSentinel(fields.price),
    type,
    address,
    phone: orSentinel(fields.phone),
    website: normalizeWebsite(bundle.websiteUrl),
  });
}

/**
 * 리스팅 필드 파서
 */
export class ListingFieldParser {
  private readonly stages: ExtractionStage[];
  private readonly log: Logger;

  constructor(options: ExtractionPipelineOptions = {}, log?: Logger) {
    this.stages = createExtractionPipeline(options);
    this.log = log ?? createComponentLogger("ListingFieldParser");
  }

  /**
   * 번들 1개 파싱
   * @returns 레코드, 이름이 없으면 null
   */
  parse(bundle: RawListingBundle): ListingRecord | null {
    const name = normalizeText(bundle.nameRaw);

    if (isSentinel(name)) {
      this.log.info({ infoText: bundle.infoTextRaw }, "이름 없음 - 항목 건너뜀");
      return null;
    }

    const listingLog = this.log.child({ listing: name });
    const initial = createInitialState(normalizeText(bundle.infoTextRaw));
    const result = runExtractionPipeline(this.stages, initial, listingLog);

    if (result.failedStage) {
      listingLog.warn(
        { failedStage: result.failedStage, fields: result.state.fields },
        "일부 필드만 추출됨 - 나머지는 N/A",
      );
    }

    const record = finalizeRecord(name, result.state.fields, bundle);
    listingLog.debug({ record }, "레코드 생성");
    return record;
  }

  /**
   * 번들 목록 순차 파싱 (순서 유지)
   * 한 항목의 실패가 전체를 중단시키지 않는다
   */
  parseAll(bundles: readonly RawListingBundle[]): ListingRecord[] {
    const records: ListingRecord[] = [];

    bundles.forEach((bundle, index) => {
      try {
        const record = this.parse(bundle);
        if (record) {
          records.push(record);
        }
      } catch (error) {
        this.log.warn({ index, error }, `항목 ${index + 1} 파싱 실패 - 건너뜀`);
      }
    });

    this.log.info({ bundles: bundles.length, records: records.length }, "리스팅 파싱 완료");
    return records;
  }
}
