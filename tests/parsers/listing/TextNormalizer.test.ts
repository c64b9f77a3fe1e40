/**
 * TextNormalizer Test
 *
 * 목적: 원본 텍스트 정규화 / sentinel 판정 검증
 */

import { describe, it, expect } from "@jest/globals";
import {
  collapseWhitespace,
  escapeRegExp,
  isSentinel,
  normalizeText,
} from "@/parsers/listing/TextNormalizer";

describe("TextNormalizer", () => {
  describe("normalizeText()", () => {
    it("아이콘 글리프(PUA)를 제거하고 공백을 정리해야 함", () => {
      expect(normalizeText("  \uE0C8 Dishoom \n  Covent\tGarden ")).toBe("Dishoom Covent Garden");
    });

    it("빈 값/누락 값은 N/A여야 함", () => {
      expect(normalizeText(null)).toBe("N/A");
      expect(normalizeText(undefined)).toBe("N/A");
      expect(normalizeText("\uE0C8")).toBe("N/A");
      expect(normalizeText("   ")).toBe("N/A");
      expect(normalizeText("\uE0C8\uF8FF")).toBe("N/A");
    });

    it.each(["  a \uE000 b  ", "4.5 stars · (1,234)", "", "N/A", "x  y"])(
      "멱등이어야 함: %j",
      (input) => {
        const once = normalizeText(input);
        expect(normalizeText(once)).toBe(once);
      },
    );
  });

  describe("collapseWhitespace()", () => {
    it("빈 문자열은 빈 문자열로 유지해야 함", () => {
      expect(collapseWhitespace("")).toBe("");
      expect(collapseWhitespace(" \t ")).toBe("");
    });
  });

  describe("isSentinel()", () => {
    it("N/A와 빈 값을 sentinel로 판정해야 함", () => {
      expect(isSentinel("N/A")).toBe(true);
      expect(isSentinel(" N/A ")).toBe(true);
      expect(isSentinel("")).toBe(true);
      expect(isSentinel(null)).toBe(true);
      expect(isSentinel(undefined)).toBe(true);
    });

    it("실제 값은 sentinel이 아니어야 함", () => {
      expect(isSentinel("n/a")).toBe(false);
      expect(isSentinel("Italian")).toBe(false);
    });
  });

  describe("escapeRegExp()", () => {
    it("정규식 특수문자를 이스케이프해야 함", () => {
      expect(escapeRegExp("+44 (20)")).toBe("\\+44 \\(20\\)");
      expect(new RegExp(escapeRegExp("$$")).test("price $$")).toBe(true);
    });
  });
});
