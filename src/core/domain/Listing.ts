/**
 * 리스팅 도메인 모델
 *
 * RawListingBundle: 결과 항목 1개에서 읽은 원본 텍스트 묶음 (일회용)
 * ListingRecord: 파서가 만든 최종 레코드 (생성 후 불변)
 */

/**
 * 결과 항목 원본 묶음
 */
export interface RawListingBundle {
  /** 제목 링크의 accessible name */
  nameRaw: string | null;
  /** info fragment 전체를 구분자로 결합한 문자열 */
  infoTextRaw: string;
  /** 별점 라벨에서 읽은 평점 (예: "4.5") */
  ratingHint?: string | null;
  /** 별점 옆 리뷰 수 (예: "(1,234)") */
  reviewsHint?: string | null;
  /** 웹사이트 링크 href */
  websiteUrl?: string | null;
}

/**
 * 레코드 필드 순서 (출력 순서와 동일)
 */
export const LISTING_FIELDS = [
  "name",
  "rating",
  "reviews",
  "price",
  "type",
  "address",
  "phone",
  "website",
] as const;

export type ListingField = (typeof LISTING_FIELDS)[number];

/**
 * 출력 라벨
 */
export const LISTING_FIELD_LABELS: Record<ListingField, string> = {
  name: "Name",
  rating: "Rating",
  reviews: "Reviews",
  price: "Price",
  type: "Type",
  address: "Address",
  phone: "Phone Number",
  website: "Website",
};

/**
 * 최종 리스팅 레코드
 * 모든 필드는 값 또는 "N/A"
 */
export type ListingRecord = Readonly<Record<ListingField, string>>;

/**
 * info 텍스트에서 추출하는 필드 (name, website 제외)
 */
export type ExtractedField = Exclude<ListingField, "name" | "website">;
