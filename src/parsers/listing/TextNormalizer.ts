/**
 * 텍스트 정규화 유틸리티
 *
 * - Private Use Area(U+E000–U+F8FF) 아이콘 글리프 제거
 * - 공백 연속 → 단일 공백
 * - 앞뒤 공백 제거
 */

import { NOT_AVAILABLE } from "../../config/constants";

const PRIVATE_USE_AREA = /[\uE000-\uF8FF]/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * 공백 정리 (빈 문자열은 그대로 빈 문자열)
 * 작업 버퍼 정리에 사용
 */
export function collapseWhitespace(text: string): string {
  return text.replace(PRIVATE_USE_AREA, "").replace(WHITESPACE_RUN, " ").trim();
}

/**
 * 원본 텍스트 정규화
 * 빈 값/누락 값은 "N/A"
 *
 * 멱등: normalizeText(normalizeText(x)) === normalizeText(x)
 */
export function normalizeText(text: string | null | undefined): string {
  if (!text) {
    return NOT_AVAILABLE;
  }
  return collapseWhitespace(text) || NOT_AVAILABLE;
}

/**
 * Sentinel 여부 (trim 후 "N/A"이거나 빈 값)
 */
export function isSentinel(value: string | null | undefined): boolean {
  return !value || value.trim() === "" || value.trim() === NOT_AVAILABLE;
}

/**
 * 정규식 특수문자 이스케이프
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
