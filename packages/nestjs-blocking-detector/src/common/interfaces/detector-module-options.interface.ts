import { RedisConnectionOptions } from '../redis-connection.manager';

export interface DetectorModuleOptions {
  /**
   * 模块初始化时创建的 formula
   */
  formulaIds?: string[];
  redisOptions?: RedisConnectionOptions;
  queueOptions?: {
    formulaQueuePrefix?: string;
  };
  supervisionOptions?: {
    /**
     * 阻塞检查轮询间隔（毫秒）
     */
    interval?: number;
  };
}

/**
 * 合并模块选项与环境变量配置后的结果
 */
export interface ResolvedDetectorOptions {
  formulaIds: string[];
  redis: Required<Omit<RedisConnectionOptions, 'password'>> & Pick<RedisConnectionOptions, 'password'>;
  formulaQueuePrefix: string;
  supervisionInterval: number;
}
