/**
 * ResultFormatter - 리스팅 레코드 출력 포맷
 *
 * SOLID 원칙:
 * - SRP: 레코드 → 문자열 변환만 담당 (stdout 쓰기는 CLI)
 *
 * 포맷:
 * - table: 열 정렬 표 (기본)
 * - lines: 항목별 "Label: value" 블록
 * - json: 라벨을 키로 쓰는 JSON 배열
 */

import { z } from "zod";
import {
  LISTING_FIELDS,
  LISTING_FIELD_LABELS,
  ListingRecord,
} from "../core/domain/Listing";

export const OutputFormatSchema = z.enum(["table", "lines", "json"]);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const COLUMN_GAP = "  ";

export class ResultFormatter {
  /**
   * 열 정렬 표 (첫 열은 1부터 시작하는 순번)
   */
  static formatTable(records: readonly ListingRecord[]): string {
    const header = ["#", ...LISTING_FIELDS.map((field) => LISTING_FIELD_LABELS[field])];
    const rows = records.map((record, index) => [
      String(index + 1),
      ...LISTING_FIELDS.map((field) => record[field]),
    ]);

    const widths = header.map((label, column) =>
      Math.max(label.length, ...rows.map((row) => row[column].length)),
    );

    return [header, ...rows]
      .map((cells) =>
        cells
          .map((cell, column) => cell.padEnd(widths[column]))
          .join(COLUMN_GAP)
          .trimEnd(),
      )
      .join("\n");
  }

  /**
   * 항목별 블록 (블록 사이 빈 줄)
   */
  static formatLines(records: readonly ListingRecord[]): string {
    return records
      .map((record, index) =>
        [
          `--- Result ${index + 1} ---`,
          ...LISTING_FIELDS.map((field) => `  ${LISTING_FIELD_LABELS[field]}: ${record[field]}`),
        ].join("\n"),
      )
      .join("\n\n");
  }

  /**
   * JSON 배열 (들여쓰기 2칸)
   */
  static formatJson(records: readonly ListingRecord[]): string {
    const labelled = records.map((record) =>
      Object.fromEntries(LISTING_FIELDS.map((field) => [LISTING_FIELD_LABELS[field], record[field]])),
    );
    return JSON.stringify(labelled, null, 2);
  }

  static format(records: readonly ListingRecord[], format: OutputFormat): string {
    switch (format) {
      case "table":
        return ResultFormatter.formatTable(records);
      case "lines":
        return ResultFormatter.formatLines(records);
      case "json":
        return ResultFormatter.formatJson(records);
    }
  }

  /**
   * 합계 줄
   */
  static formatSummary(count: number): string {
    return `----------------------\nTotal: ${count} places`;
  }
}
