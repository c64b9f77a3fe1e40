/**
 * ListingFieldParser Test
 *
 * 목적: 번들 → 레코드 변환, sentinel/충돌 불변식, 힌트/웹사이트 반영 검증
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { finalizeRecord, ListingFieldParser, normalizeWebsite } from "@/parsers/listing/ListingFieldParser";
import { LISTING_FIELDS, RawListingBundle } from "@/core/domain/Listing";

function bundle(infoFragments: string[], overrides: Partial<RawListingBundle> = {}): RawListingBundle {
  return {
    nameRaw: "Test Place",
    infoTextRaw: infoFragments.join(" · "),
    ...overrides,
  };
}

describe("ListingFieldParser", () => {
  let parser: ListingFieldParser;

  beforeEach(() => {
    parser = new ListingFieldParser();
  });

  describe("parse()", () => {
    it("평점/리뷰/가격/유형/주소를 추출해야 함", () => {
      const record = parser.parse(
        bundle(["4.5 stars", "(1,234)", "£20–30 · Italian · 221B Baker Street, London"], {
          nameRaw: "The Test Trattoria",
        }),
      );

      expect(record).toEqual({
        name: "The Test Trattoria",
        rating: "4.5",
        reviews: "(1,234)",
        price: "£20–30",
        type: "Italian",
        address: "221B Baker Street, London",
        phone: "N/A",
        website: "N/A",
      });
    });

    it("기호만 있는 가격 등급과 영업 상태 절을 처리해야 함", () => {
      const record = parser.parse(bundle(["$$", "Closed · Opens 9AM · Mexican · 5 Elm St"]));

      expect(record).not.toBeNull();
      expect(record?.price).toBe("$$");
      expect(record?.type).toBe("Mexican");
      expect(record?.address).toBe("N/A");
      expect(record?.rating).toBe("N/A");
    });

    it("이름이 없으면 null (항목 폐기)", () => {
      expect(parser.parse(bundle(["4.0"], { nameRaw: null }))).toBeNull();
      expect(parser.parse(bundle(["4.0"], { nameRaw: "   " }))).toBeNull();
      expect(parser.parse(bundle(["4.0"], { nameRaw: "N/A" }))).toBeNull();
    });

    it("info 텍스트가 비어 있으면 모든 추출 필드가 N/A", () => {
      const record = parser.parse(bundle([], { nameRaw: "Quiet Corner" }));

      expect(record).toEqual({
        name: "Quiet Corner",
        rating: "N/A",
        reviews: "N/A",
        price: "N/A",
        type: "N/A",
        address: "N/A",
        phone: "N/A",
        website: "N/A",
      });
    });

    it("info 텍스트에 없으면 별점 라벨 힌트를 사용해야 함", () => {
      const record = parser.parse(
        bundle(["Cafe · 40 Canal Walk"], {
          ratingHint: "4.7",
          reviewsHint: "(1,020)",
          websiteUrl: "https://example.com/menu",
        }),
      );

      expect(record?.rating).toBe("4.7");
      expect(record?.reviews).toBe("(1,020)");
      expect(record?.website).toBe("https://example.com/menu");
      expect(record?.type).toBe("Cafe");
      expect(record?.address).toBe("40 Canal Walk");
    });

    it("레코드는 불변이어야 함", () => {
      const record = parser.parse(bundle(["Pub · 3 Mill Lane"]));
      expect(Object.isFrozen(record)).toBe(true);
    });

    it("모든 필드가 값 또는 N/A여야 함 (빈 문자열 없음)", () => {
      const inputs = [
        bundle(["", " ", "·"]),
        bundle(["12345"]),
        bundle(["· · ·", "(0)"]),
        bundle(["Bar", "Bar"]),
      ];

      for (const input of inputs) {
        const record = parser.parse(input);
        expect(record).not.toBeNull();
        for (const field of LISTING_FIELDS) {
          expect(record?.[field]).toBeTruthy();
          expect(record?.[field].trim()).toBe(record?.[field]);
        }
      }
    });
  });

  describe("parseAll()", () => {
    it("순서를 유지하고 이름 없는 항목은 건너뛰어야 함", () => {
      const records = parser.parseAll([
        bundle(["Cafe · 1 First Street"], { nameRaw: "First" }),
        bundle(["Bar · 2 Second Street"], { nameRaw: null }),
        bundle(["Pub · 3 Third Street"], { nameRaw: "Third" }),
      ]);

      expect(records.map((record) => record.name)).toEqual(["First", "Third"]);
      expect(records.map((record) => record.type)).toEqual(["Cafe", "Pub"]);
    });
  });
});

describe("finalizeRecord()", () => {
  it("type과 address가 같으면 type을 N/A로 바꿔야 함", () => {
    const record = finalizeRecord("X", { type: "Cafe", address: "Cafe" }, {});

    expect(record.type).toBe("N/A");
    expect(record.address).toBe("Cafe");
  });

  it("숫자 전용 type/address는 N/A", () => {
    const record = finalizeRecord("X", { type: "42", address: "12345" }, {});

    expect(record.type).toBe("N/A");
    expect(record.address).toBe("N/A");
  });

  it("형식이 맞지 않는 힌트는 무시해야 함", () => {
    const record = finalizeRecord("X", {}, { ratingHint: "4", reviewsHint: "1,234" });

    expect(record.rating).toBe("N/A");
    expect(record.reviews).toBe("N/A");
  });

  it("info 텍스트에서 추출한 값이 힌트보다 우선해야 함", () => {
    const record = finalizeRecord("X", { rating: "3.8" }, { ratingHint: "4.1" });
    expect(record.rating).toBe("3.8");
  });
});

describe("normalizeWebsite()", () => {
  it("http(s) URL만 허용해야 함", () => {
    expect(normalizeWebsite(" https://example.com/ ")).toBe("https://example.com/");
    expect(normalizeWebsite("javascript:void(0)")).toBe("N/A");
    expect(normalizeWebsite("not a url")).toBe("N/A");
    expect(normalizeWebsite(null)).toBe("N/A");
  });
});
