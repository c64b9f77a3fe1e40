/**
 * 장소 유형 / 영업 상태 키워드 테이블
 *
 * 순서가 곧 우선순위다. 구체적인 유형이 포괄 유형보다 앞에 와야 한다.
 * (예: "Used book store" → "Book store")
 * maps.yaml의 parser.placeTypes / parser.statusKeywords로 교체 가능
 */

/**
 * 장소 유형 테이블 (canonical 표기)
 */
export const PLACE_TYPE_TABLE: readonly string[] = [
  // 세부 서점 유형
  "Used book store",
  "Comic book store",
  "Rare book store",
  // 일반 서점
  "Book store",
  // 기타 일반 유형
  "Restaurant",
  "Cafe",
  "Bar",
  "Pub",
  "Hotel",
  "Steakhouse",
  "Steak",
  "Chophouse",
  "Pakistani",
  "Indian",
  "Chinese",
  "Italian",
  "Thai",
  "Japanese",
  "Mexican",
  "Greek",
  "Turkish",
  "Lebanese",
  "Brunch",
  "Bakery",
  "Dessert",
  "Coffee",
  "Tea",
  "Fast Food",
  "Fine Dining",
  "Barbecue",
];

/**
 * 영업 상태/시간/서비스 키워드
 * 주소 뒤에 붙은 이 키워드부터 끝까지 잘라낸다
 */
export const STATUS_KEYWORD_TABLE: readonly string[] = [
  "Open",
  "Closed",
  "Closes",
  "Opening",
  "Hours",
  "Serves",
  "Delivers",
  "Takeout",
  "Dine-in",
  "Pickup",
  "Delivery",
  "Offers",
  "Ends",
  "Starts",
  "Temporary",
  "Permanently",
];
