import { registerAs } from '@nestjs/config';
import { validateDetectorConfig } from './config.schema';

/**
 * 检测器配置接口
 */
export interface DetectorConfig {
  redisHost: string;
  redisPort: number;
  redisPassword?: string;
  redisDb: number;
  formulaQueuePrefix: string;
  supervisionInterval: number;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * 从环境变量读取配置，未设置的字段使用 DetectorConfigSchema 的默认值
 */
export function loadDetectorConfig(env: NodeJS.ProcessEnv = process.env): DetectorConfig {
  const raw: Partial<DetectorConfig> = {};

  if (env.REDIS_HOST) raw.redisHost = env.REDIS_HOST;
  if (env.REDIS_PASSWORD) raw.redisPassword = env.REDIS_PASSWORD;
  if (env.FORMULA_QUEUE_PREFIX) raw.formulaQueuePrefix = env.FORMULA_QUEUE_PREFIX;

  const redisPort = parseNumber(env.REDIS_PORT);
  if (redisPort !== undefined) raw.redisPort = redisPort;

  const redisDb = parseNumber(env.REDIS_DB);
  if (redisDb !== undefined) raw.redisDb = redisDb;

  const supervisionInterval = parseNumber(env.SUPERVISION_INTERVAL);
  if (supervisionInterval !== undefined) raw.supervisionInterval = supervisionInterval;

  const validated = validateDetectorConfig(raw);

  return {
    redisHost: validated.redisHost,
    redisPort: validated.redisPort,
    redisPassword: validated.redisPassword,
    redisDb: validated.redisDb,
    formulaQueuePrefix: validated.formulaQueuePrefix,
    supervisionInterval: validated.supervisionInterval,
  };
}

/**
 * 检测器配置工厂函数
 */
export const detectorConfig = registerAs('detector', (): DetectorConfig => loadDetectorConfig());
