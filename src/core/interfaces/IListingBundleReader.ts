/**
 * Listing Bundle Reader Interface
 *
 * 로딩이 끝난 결과 목록 → RawListingBundle 목록
 */

import type { RawListingBundle } from "../domain/Listing";

export interface IListingBundleReader {
  /**
   * 렌더링된 결과 항목을 순서대로 읽는다
   * 읽지 못한 항목은 건너뛴다 (예외 없음)
   */
  readAll(): Promise<RawListingBundle[]>;
}
