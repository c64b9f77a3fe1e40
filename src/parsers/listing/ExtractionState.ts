/**
 * 추출 파이프라인 상태 모델
 *
 * 각 단계는 (state) → state' 순수 함수.
 * buffer는 단계가 진행될수록 줄어들고, 이미 소비된 구간은 다시 매칭되지 않는다.
 */

import { ExtractedField } from "../../core/domain/Listing";
import { collapseWhitespace, isSentinel } from "./TextNormalizer";

/**
 * 단계 결과 구분
 * - matched: 필드 확정 또는 버퍼 정리 수행
 * - not_matched: 해당 없음
 * - degraded: 휴리스틱/폴백 경로로 처리
 */
export type StageOutcome = "matched" | "not_matched" | "degraded";

/**
 * 단계별 진단 기록
 */
export interface StageNote {
  stage: string;
  outcome: StageOutcome;
  detail?: string;
}

/**
 * 소비된 구간 (추출 순서대로 누적)
 */
export interface ConsumedSpan {
  field: ExtractedField;
  text: string;
}

export interface ExtractionState {
  /** 정규화된 원본 info 텍스트 (변경 안 됨) */
  readonly original: string;
  /** 남은 작업 텍스트 */
  readonly buffer: string;
  readonly fields: Readonly<Partial<Record<ExtractedField, string>>>;
  readonly spans: readonly ConsumedSpan[];
  readonly notes: readonly StageNote[];
}

/**
 * 추출 단계 인터페이스
 */
export interface ExtractionStage {
  readonly name: string;
  apply(state: ExtractionState): ExtractionState;
}

/**
 * 초기 상태 생성
 * "N/A"/빈 텍스트는 빈 버퍼로 시작
 */
export function createInitialState(infoText: string | null | undefined): ExtractionState {
  const text = isSentinel(infoText) ? "" : collapseWhitespace(infoText ?? "");
  return {
    original: text,
    buffer: text,
    fields: {},
    spans: [],
    notes: [],
  };
}

/**
 * [start, end) 구간 제거
 */
export function removeSpan(text: string, start: number, end: number): string {
  return text.slice(0, start) + text.slice(end);
}

/**
 * 필드 확정 + 구간 소비
 */
export function withField(
  state: ExtractionState,
  stage: string,
  field: ExtractedField,
  value: string,
  consumed: { start: number; text: string },
  note: Omit<StageNote, "stage"> = { outcome: "matched" },
): ExtractionState {
  return {
    ...state,
    buffer: removeSpan(state.buffer, consumed.start, consumed.start + consumed.text.length),
    fields: { ...state.fields, [field]: value },
    spans: [...state.spans, { field, text: consumed.text }],
    notes: [...state.notes, { stage, ...note }],
  };
}

/**
 * 진단 기록만 추가 (버퍼 변경 선택)
 */
export function withNote(
  state: ExtractionState,
  stage: string,
  outcome: StageOutcome,
  detail?: string,
  buffer: string = state.buffer,
): ExtractionState {
  return {
    ...state,
    buffer,
    notes: [...state.notes, detail === undefined ? { stage, outcome } : { stage, outcome, detail }],
  };
}
