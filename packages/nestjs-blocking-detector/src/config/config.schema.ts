import { IsString, IsNumber, IsInt, IsOptional, IsNotEmpty, Min, Max, validateSync } from 'class-validator';
import { ConfigurationError } from '../common/errors/detector.errors';

/**
 * 检测器插件配置验证模式
 */
export class DetectorConfigSchema {
  /**
   * Redis 主机
   */
  @IsString()
  @IsNotEmpty()
  redisHost: string = 'localhost';

  /**
   * Redis 端口
   */
  @IsInt()
  @Min(1)
  @Max(65535)
  redisPort: number = 6379;

  /**
   * Redis 密码
   */
  @IsString()
  @IsOptional()
  redisPassword?: string;

  /**
   * Redis 数据库编号
   */
  @IsInt()
  @Min(0)
  redisDb: number = 0;

  /**
   * Formula 执行队列名称前缀
   */
  @IsString()
  @IsNotEmpty()
  formulaQueuePrefix: string = 'formula-queue';

  /**
   * 阻塞检查轮询间隔（毫秒）
   */
  @IsNumber()
  @Min(100)
  supervisionInterval: number = 1000;
}

/**
 * 校验配置，任一约束不满足即抛出 ConfigurationError
 */
export function validateDetectorConfig(config: Partial<DetectorConfigSchema>): DetectorConfigSchema {
  const schema = Object.assign(new DetectorConfigSchema(), config);
  const errors = validateSync(schema);

  if (errors.length > 0) {
    const violations = errors.flatMap((error) => Object.values(error.constraints ?? {}));
    throw new ConfigurationError(`Invalid detector configuration: ${violations.join('; ')}`, violations);
  }

  return schema;
}
