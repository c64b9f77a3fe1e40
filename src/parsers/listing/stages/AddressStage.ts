/**
 * 주소 추출 단계 (마지막)
 *
 * 남은 버퍼 전체에서 영업 상태/시간/서비스 키워드가 처음 나오는 지점부터 끝까지 잘라낸다.
 * 결과가 최소 길이 미만이면 주소로 보지 않는다.
 */

import { ExtractionStage, ExtractionState, withField, withNote } from "../ExtractionState";
import { collapseWhitespace, escapeRegExp } from "../TextNormalizer";

export interface AddressStageOptions {
  statusKeywords: readonly string[];
  separator: string;
  minLength: number;
}

/**
 * 상태 키워드 절 패턴
 * 예: " · Open 24 hours", "Closed · Opens 9AM"
 */
export function compileStatusClausePattern(statusKeywords: readonly string[], separator: string): RegExp {
  const glyph = separator.trim();
  const leading = glyph ? `(?:\\s*${escapeRegExp(glyph)}\\s*)?` : "";
  const keywords = statusKeywords.map(escapeRegExp).join("|");
  return new RegExp(`${leading}(?<![\\p{L}\\p{N}])(?:${keywords}).*$`, "iu");
}

export function createAddressStage(options: AddressStageOptions): ExtractionStage {
  const statusClause =
    options.statusKeywords.length > 0
      ? compileStatusClausePattern(options.statusKeywords, options.separator)
      : null;

  const stage: ExtractionStage = {
    name: "address",
    apply(state: ExtractionState): ExtractionState {
      if (!state.buffer) {
        return withNote(state, stage.name, "not_matched");
      }

      const truncated = statusClause ? state.buffer.replace(statusClause, "") : state.buffer;
      const address = collapseWhitespace(truncated);

      if (address.length < options.minLength) {
        return withNote(
          state,
          stage.name,
          "not_matched",
          address ? `too short: "${address}"` : "empty after truncation",
        );
      }

      return withField(state, stage.name, "address", address, {
        start: 0,
        text: state.buffer,
      });
    },
  };

  return stage;
}
