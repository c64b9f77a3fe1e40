/**
 * PlaceType / Address / SeparatorCleanup Stage Test
 *
 * 목적: 우선순위 테이블 매칭, 상태 절 잘라내기, 구분자 정리 검증
 */

import { describe, it, expect } from "@jest/globals";
import { createInitialState } from "@/parsers/listing/ExtractionState";
import { PLACE_TYPE_TABLE, STATUS_KEYWORD_TABLE } from "@/parsers/listing/PlaceTypeTable";
import { createPlaceTypeStage } from "@/parsers/listing/stages/PlaceTypeStage";
import { createAddressStage } from "@/parsers/listing/stages/AddressStage";
import {
  cleanupSeparators,
  createSeparatorCleanupStage,
} from "@/parsers/listing/stages/SeparatorCleanupStage";

describe("PlaceTypeStage", () => {
  const typeStage = createPlaceTypeStage(PLACE_TYPE_TABLE);

  it("테이블 표기(canonical)로 저장해야 함", () => {
    const state = typeStage.apply(createInitialState("ITALIAN · 8 Dean St"));

    expect(state.fields.type).toBe("Italian");
    expect(state.buffer).toBe(" · 8 Dean St");
    expect(state.notes).toEqual([{ stage: "type", outcome: "matched", detail: 'keyword "Italian"' }]);
  });

  it.each([
    ["Used book store · 3 Mill Lane", "Used book store"],
    ["Comic book store", "Comic book store"],
    ["Book store · Leeds", "Book store"],
    ["Steakhouse · 1 Strand", "Steakhouse"],
  ])("구체적인 유형이 포괄 유형보다 우선해야 함: %s", (text, expected) => {
    expect(typeStage.apply(createInitialState(text)).fields.type).toBe(expected);
  });

  it("단어 일부는 매칭하지 않아야 함", () => {
    const state = typeStage.apply(createInitialState("Barbican Centre"));

    expect(state.fields.type).toBeUndefined();
    expect(state.notes).toEqual([{ stage: "type", outcome: "not_matched" }]);
  });

  it("테이블 순서가 우선순위여야 함", () => {
    const reordered = createPlaceTypeStage(["Pub", "Restaurant"]);
    expect(reordered.apply(createInitialState("Restaurant · Pub")).fields.type).toBe("Pub");
  });
});

describe("AddressStage", () => {
  const addressStage = createAddressStage({
    statusKeywords: STATUS_KEYWORD_TABLE,
    separator: " · ",
    minLength: 5,
  });

  it("상태 키워드 절을 잘라내야 함", () => {
    const state = addressStage.apply(createInitialState("5 Elm St · Open 24 hours"));

    expect(state.fields.address).toBe("5 Elm St");
    expect(state.buffer).toBe("");
  });

  it("키워드는 대소문자를 구분하지 않아야 함", () => {
    const state = addressStage.apply(createInitialState("9 Rue Cler · takeout · Delivery"));
    expect(state.fields.address).toBe("9 Rue Cler");
  });

  it("키워드로 시작하면 주소 없음", () => {
    const state = addressStage.apply(createInitialState("Closed · Opens 9AM · 5 Elm St"));

    expect(state.fields.address).toBeUndefined();
    expect(state.notes).toEqual([
      { stage: "address", outcome: "not_matched", detail: "empty after truncation" },
    ]);
  });

  it("최소 길이 미만이면 주소 없음", () => {
    const state = addressStage.apply(createInitialState("Soho"));

    expect(state.fields.address).toBeUndefined();
    expect(state.notes).toEqual([
      { stage: "address", outcome: "not_matched", detail: 'too short: "Soho"' },
    ]);
  });

  it("빈 버퍼는 매칭 없음", () => {
    const state = addressStage.apply(createInitialState(""));
    expect(state.notes).toEqual([{ stage: "address", outcome: "not_matched" }]);
  });
});

describe("SeparatorCleanupStage", () => {
  it("연속 구분자를 합치고 앞뒤 구분자를 제거해야 함", () => {
    expect(cleanupSeparators(" ·  · Italian ·  · Soho · ", " · ")).toBe("Italian · Soho");
  });

  it("변경이 없으면 not_matched", () => {
    const stage = createSeparatorCleanupStage("cleanup", " · ");
    const state = stage.apply(createInitialState("Italian · Soho"));

    expect(state.buffer).toBe("Italian · Soho");
    expect(state.notes).toEqual([{ stage: "cleanup", outcome: "not_matched" }]);
  });
});
