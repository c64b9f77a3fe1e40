/**
 * 로거 컨텍스트 유틸리티
 *
 * 컨텍스트 인식 로거 생성 헬퍼 함수
 */

import { logger, Logger } from "../config/logger";

/**
 * 검색 세션 전용 로거 생성
 * @param query 검색어
 * @param sessionId 세션 ID (uuid v7)
 * @returns 세션 컨텍스트가 포함된 자식 로거
 */
export function createSessionLogger(query: string, sessionId: string): Logger {
  return logger.child({ session_id: sessionId, query });
}

/**
 * 컴포넌트 전용 로거 생성
 * @param component 컴포넌트 이름 (예: "FeedCollector")
 * @param parent 부모 로거 (기본: 전역 로거)
 */
export function createComponentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
