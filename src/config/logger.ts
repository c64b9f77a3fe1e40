/**
 * 로거 설정
 * Pino 기반 로깅 시스템
 *
 * 기능:
 * - 콘솔 출력은 stderr 전용 (stdout은 결과 출력용)
 * - 선택적 파일 출력 (LOG_TO_FILE=true) + 일일 로테이션
 * - 환경별 설정
 * - 구조화된 JSON 로깅
 *
 * 콘솔 출력:
 * - 기본: JSON 포맷
 * - LOG_PRETTY=true: 색상 한 줄 포맷
 *
 * 파일 출력:
 * - logs/YYYY-MM-DD/{SERVICE_NAME}.log
 * - 일일 로테이션, 14일 보관
 */

import pino from "pino";
import { createStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import { getDateStringWithDash, getTimestampWithTimezone } from "../utils/timestamp";
import { APP_METADATA } from "./constants";

// 환경 변수
const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test" ? "silent" : NODE_ENV === "production" ? "info" : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE === "true";
const SERVICE_NAME = process.env.SERVICE_NAME || "cli";

/**
 * 날짜별 디렉터리에 로그 파일 생성
 * 구조: LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string) {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }

  return createStream(
    () => {
      const dateDir = getDateStringWithDash();
      const fullDir = path.join(LOG_DIR, dateDir);

      if (!fs.existsSync(fullDir)) {
        fs.mkdirSync(fullDir, { recursive: true });
      }

      return path.join(dateDir, `${prefix}.log`);
    },
    {
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      path: LOG_DIR,
      maxFiles: 14,
      maxSize: "50M",
    },
  );
}

/**
 * 기본 로거 설정
 */
const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: APP_METADATA.SERVICE,
    env: NODE_ENV,
    service_name: SERVICE_NAME,
  },
};

/**
 * Pino 로그 레벨 상수
 */
const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/**
 * 콘솔에서 생략하는 공통 필드
 */
const EXCLUDED_FIELDS = ["level", "time", "service", "env", "pid", "hostname", "msg"];

/**
 * 개발용 콘솔 포맷터 (색상 + 한 줄 필드)
 */
function formatConsolePretty(logObj: Record<string, unknown>, level: number): void {
  const time = new Date().toLocaleTimeString("en-US", { hour12: false });
  const levelColor =
    level >= LOG_LEVELS.ERROR ? "\x1b[31m" : level >= LOG_LEVELS.WARN ? "\x1b[33m" : "\x1b[32m";
  const levelText =
    level >= LOG_LEVELS.ERROR
      ? "ERROR"
      : level >= LOG_LEVELS.WARN
        ? "WARN"
        : level >= LOG_LEVELS.INFO
          ? "INFO"
          : "DEBUG";
  const msg = typeof logObj.msg === "string" ? logObj.msg : "";

  const fields = Object.keys(logObj)
    .filter((key) => !EXCLUDED_FIELDS.includes(key))
    .map((key) => {
      const value = logObj[key];
      if (value instanceof Error) {
        return `${key}=${value.message}`;
      }
      return `${key}=${typeof value === "object" ? JSON.stringify(value) : String(value)}`;
    });

  process.stderr.write(
    `[${time}] ${levelColor}${levelText}\x1b[0m \x1b[36m${msg}\x1b[0m${fields.length > 0 ? ` ${fields.join(" ")}` : ""}\n`,
  );
}

/**
 * 콘솔 출력 Hook 생성
 * Pino 형식: logger.info(obj, msg) 또는 logger.info(msg)
 */
function createPrettyConsoleHook(minLevel: number): pino.LoggerOptions["hooks"] {
  return {
    logMethod(inputArgs, method, level) {
      method.apply(this, inputArgs);

      if (level < minLevel) {
        return;
      }

      const [first, second]: unknown[] = inputArgs;
      const logObj: Record<string, unknown> = {};

      if (typeof first === "string") {
        logObj.msg = first;
      } else if (typeof first === "object" && first !== null) {
        Object.assign(logObj, first);
        if (typeof second === "string") {
          logObj.msg = second;
        }
      }

      formatConsolePretty(logObj, level);
    },
  };
}

// 출력 스트림 구성
const streams: pino.StreamEntry[] = [];

if (LOG_TO_FILE && LOG_LEVEL !== "silent") {
  streams.push({ level: "debug", stream: createRotatingStream(SERVICE_NAME) });
}

if (!LOG_PRETTY) {
  // 콘솔 JSON (stderr)
  streams.push({ level: "trace", stream: pino.destination(2) });
}

const logger: pino.Logger = LOG_PRETTY
  ? pino(
      { ...baseConfig, hooks: createPrettyConsoleHook(pino.levels.values[LOG_LEVEL] ?? LOG_LEVELS.DEBUG) },
      pino.multistream(streams),
    )
  : pino(baseConfig, pino.multistream(streams));

export { logger };

export type Logger = pino.Logger;
