/**
 * 구분자 정리 단계
 *
 * 구간 제거 후 남은 "· ·" 연속 구분자를 하나로 합치고
 * 앞뒤 구분자를 제거한다.
 */

import { ExtractionStage, ExtractionState, withNote } from "../ExtractionState";
import { collapseWhitespace, escapeRegExp } from "../TextNormalizer";

/**
 * 구분자 정리 (순수 함수)
 * @param text 작업 텍스트
 * @param separator 결합 구분자 (예: " · ")
 */
export function cleanupSeparators(text: string, separator: string): string {
  const glyph = separator.trim();
  const collapsed = collapseWhitespace(text);

  if (!glyph) {
    return collapsed;
  }

  const g = escapeRegExp(glyph);
  const repeated = new RegExp(`${g}(?:\\s*${g})+`, "g");
  const edges = new RegExp(`^(?:\\s|${g})+|(?:\\s|${g})+$`, "g");

  return collapseWhitespace(collapsed.replace(repeated, glyph).replace(edges, ""));
}

export function createSeparatorCleanupStage(name: string, separator: string): ExtractionStage {
  return {
    name,
    apply(state: ExtractionState): ExtractionState {
      const buffer = cleanupSeparators(state.buffer, separator);
      return withNote(state, name, buffer === state.buffer ? "not_matched" : "matched", undefined, buffer);
    },
  };
}
