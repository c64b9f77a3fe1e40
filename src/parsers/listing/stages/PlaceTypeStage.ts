/**
 * 장소 유형 추출 단계
 *
 * 우선순위 테이블 순서대로 대소문자 무시 + 단어 경계 매칭.
 * 테이블에서 먼저 매칭된 항목이 이기며, 텍스트 표기가 아닌 테이블 표기를 저장한다.
 */

import { ExtractionStage, ExtractionState, withField, withNote } from "../ExtractionState";
import { escapeRegExp } from "../TextNormalizer";

interface CompiledPlaceType {
  canonical: string;
  pattern: RegExp;
}

/**
 * 키워드 → 단어 경계 패턴 (유니코드 문자/숫자 기준)
 */
export function compileKeywordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, "iu");
}

export function createPlaceTypeStage(table: readonly string[]): ExtractionStage {
  const compiled: CompiledPlaceType[] = table.map((canonical) => ({
    canonical,
    pattern: compileKeywordPattern(canonical),
  }));

  const stage: ExtractionStage = {
    name: "type",
    apply(state: ExtractionState): ExtractionState {
      for (const { canonical, pattern } of compiled) {
        const match = pattern.exec(state.buffer);
        if (match) {
          return withField(
            state,
            stage.name,
            "type",
            canonical,
            { start: match.index, text: match[0] },
            { outcome: "matched", detail: `keyword "${canonical}"` },
          );
        }
      }
      return withNote(state, stage.name, "not_matched");
    },
  };

  return stage;
}
