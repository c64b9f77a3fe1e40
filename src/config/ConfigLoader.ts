/**
 * YAML 설정 로더
 * Singleton Pattern
 *
 * 역할:
 * - maps.yaml 로드 (MAPS_CONFIG_PATH로 경로 교체 가능)
 * - MapsScraperConfig 스키마 검증 (Zod)
 * - 환경변수 오버라이드 (HEADLESS)
 * - 템플릿 변수 치환 (${query})
 * - 설정 캐싱
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import {
  MapsScraperConfig,
  MapsScraperConfigSchema,
  NavigationStep,
} from "../core/domain/MapsScraperConfig";
import { ConfigValidationError, toErrorMessage } from "../core/interfaces/ScraperErrorType";
import { PATH_CONFIG } from "./constants";
import { logger } from "./logger";

/**
 * Config Loader Singleton
 */
export class ConfigLoader {
  private static instance: ConfigLoader;
  private configCache: Map<string, MapsScraperConfig> = new Map();
  private configPath: string;

  private constructor() {
    this.configPath =
      PATH_CONFIG.CONFIG_PATH_OVERRIDE || path.join(__dirname, PATH_CONFIG.DEFAULT_CONFIG_FILE);
  }

  /**
   * Singleton 인스턴스 반환
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 설정 로드
   * @param configPath 설정 파일 경로 (기본: maps.yaml)
   */
  loadConfig(configPath: string = this.configPath): MapsScraperConfig {
    const cached = this.configCache.get(configPath);
    if (cached) {
      return cached;
    }

    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError(configPath, "설정 파일을 찾을 수 없습니다");
    }

    let rawConfig: unknown;
    try {
      rawConfig = yaml.load(fs.readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigValidationError(configPath, `YAML 파싱 실패: ${toErrorMessage(error)}`);
    }

    const parseResult = MapsScraperConfigSchema.safeParse(rawConfig);
    if (!parseResult.success) {
      const detail = parseResult.error.errors
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join(", ");
      logger.error({ configPath, errors: parseResult.error.errors }, "Config validation failed");
      throw new ConfigValidationError(configPath, detail);
    }

    const config = this.applyEnvOverrides(parseResult.data);
    this.configCache.set(configPath, config);

    logger.debug(
      { configPath, site: config.site.name, steps: config.navigation.length },
      "Config loaded",
    );

    return config;
  }

  /**
   * 환경변수 오버라이드
   * - HEADLESS=true|false
   */
  private applyEnvOverrides(config: MapsScraperConfig): MapsScraperConfig {
    const headless = process.env.HEADLESS;
    if (headless !== "true" && headless !== "false") {
      return config;
    }

    return {
      ...config,
      browser: { ...config.browser, headless: headless === "true" },
    };
  }

  /**
   * 템플릿 변수 치환
   * @param text 치환할 텍스트
   * @param context 변수 컨텍스트
   * @param encode 값 인코더 (URL 필드는 encodeURIComponent)
   */
  substituteVariables(
    text: string,
    context: Record<string, string>,
    encode: (value: string) => string = (value) => value,
  ): string {
    return text.replace(/\$\{(\w+)\}/g, (match, key: string) => {
      const value = context[key];
      return value === undefined ? match : encode(value);
    });
  }

  /**
   * 네비게이션 단계 템플릿 치환
   */
  substituteStep(step: NavigationStep, context: Record<string, string>): NavigationStep {
    const sub = (text: string) => this.substituteVariables(text, context);

    switch (step.action) {
      case "navigate":
        return { ...step, url: this.substituteVariables(step.url, context, encodeURIComponent) };
      case "click":
        return { ...step, selector: sub(step.selector) };
      case "fill":
        return { ...step, selector: sub(step.selector), value: sub(step.value) };
      case "press":
        return { ...step, selector: sub(step.selector), key: sub(step.key) };
      case "wait":
        return step;
    }
  }

  /**
   * 캐시 초기화 (테스트용)
   */
  clearCache(): void {
    this.configCache.clear();
  }

  /**
   * 기본 설정 경로 변경 (테스트용)
   */
  setConfigPath(configPath: string): void {
    this.configPath = configPath;
    this.clearCache();
  }
}
