/**
 * Browser Launch Arguments
 *
 * SOLID 원칙:
 * - SRP: Browser 실행 인자 관리만 담당
 * - OCP: 카테고리별 확장 가능
 */

/**
 * Browser Arguments Categories
 */
export const BROWSER_ARGS = {
  /**
   * 메모리 최적화 플래그
   */
  MEMORY_OPTIMIZED: [
    "--disable-dev-shm-usage", // /dev/shm 사용 최소화
    "--disable-gpu",
    "--disable-extensions",
    "--disable-background-networking",
    "--no-first-run",
  ],

  /**
   * Stealth 플래그 (자동화 제어 표시 제거)
   */
  STEALTH: ["--disable-blink-features=AutomationControlled"],

  /**
   * Sandbox 플래그 (Docker 환경에서 필수)
   */
  SANDBOX: ["--no-sandbox", "--disable-setuid-sandbox"],

  /**
   * 컨테이너 조합 (Sandbox + Memory + Stealth)
   */
  get CONTAINER(): string[] {
    return [...this.SANDBOX, ...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },

  /**
   * 로컬 조합 (Memory + Stealth)
   */
  get LOCAL(): string[] {
    return [...this.MEMORY_OPTIMIZED, ...this.STEALTH];
  },
};

/**
 * 실행 인자 결정
 * 설정에 명시된 인자가 우선, 없으면 실행 환경(IN_CONTAINER)에 따른 기본 조합
 */
export function resolveBrowserArgs(
  configured?: readonly string[],
  inContainer: boolean = process.env.IN_CONTAINER === "true",
): string[] {
  if (configured && configured.length > 0) {
    return [...configured];
  }
  return inContainer ? BROWSER_ARGS.CONTAINER : BROWSER_ARGS.LOCAL;
}
