/**
 * 리스팅 info 텍스트 추출 파이프라인
 *
 * 단계 순서 (각 단계는 매칭 구간을 버퍼에서 제거):
 * 1. rating → 2. reviews → 3. price → 4. phone (원본 텍스트 기준)
 * 5. 구분자 정리 → 6. type → 7. 구분자 정리 → 8. address (나머지)
 */

import type { Logger } from "../../config/logger";
import { PARSER_DEFAULTS } from "../../config/constants";
import { ExtractionStage, ExtractionState } from "./ExtractionState";
import { PLACE_TYPE_TABLE, STATUS_KEYWORD_TABLE } from "./PlaceTypeTable";
import { ratingStage } from "./stages/RatingStage";
import { reviewsStage } from "./stages/ReviewsStage";
import { priceStage } from "./stages/PriceStage";
import { phoneStage } from "./stages/PhoneStage";
import { createSeparatorCleanupStage } from "./stages/SeparatorCleanupStage";
import { createPlaceTypeStage } from "./stages/PlaceTypeStage";
import { createAddressStage } from "./stages/AddressStage";

/**
 * 파이프라인 옵션
 */
export interface ExtractionPipelineOptions {
  separator?: string;
  placeTypes?: readonly string[];
  statusKeywords?: readonly string[];
  minAddressLength?: number;
}

/**
 * 파이프라인 실행 결과
 */
export interface PipelineRunResult {
  state: ExtractionState;
  /** 예외가 발생한 단계 (없으면 null) */
  failedStage: string | null;
  error?: unknown;
}

/**
 * 순서가 고정된 단계 목록 생성
 */
export function createExtractionPipeline(options: ExtractionPipelineOptions = {}): ExtractionStage[] {
  const separator = options.separator ?? PARSER_DEFAULTS.SEPARATOR;

  return [
    ratingStage,
    reviewsStage,
    priceStage,
    phoneStage,
    createSeparatorCleanupStage("cleanup:after-phone", separator),
    createPlaceTypeStage(options.placeTypes ?? PLACE_TYPE_TABLE),
    createSeparatorCleanupStage("cleanup:after-type", separator),
    createAddressStage({
      statusKeywords: options.statusKeywords ?? STATUS_KEYWORD_TABLE,
      separator,
      minLength: options.minAddressLength ?? PARSER_DEFAULTS.MIN_ADDRESS_LENGTH,
    }),
  ];
}

/**
 * 단계 순차 실행
 *
 * 단계에서 예외가 나면 그 지점에서 멈추고 직전 상태를 돌려준다.
 * (이미 확정된 필드는 유지)
 */
export function runExtractionPipeline(
  stages: readonly ExtractionStage[],
  initial: ExtractionState,
  log?: Logger,
): PipelineRunResult {
  let state = initial;

  for (const stage of stages) {
    const noteCount = state.notes.length;

    try {
      state = stage.apply(state);
    } catch (error) {
      log?.warn({ stage: stage.name, error }, "추출 단계 실패 - 이후 단계 생략");
      return { state, failedStage: stage.name, error };
    }

    for (const note of state.notes.slice(noteCount)) {
      log?.debug(
        { stage: note.stage, outcome: note.outcome, detail: note.detail, remaining: state.buffer },
        `[Extract] ${note.stage}: ${note.outcome}`,
      );
    }
  }

  return { state, failedStage: null };
}
