import { Injectable, OnApplicationShutdown, Logger } from '@nestjs/common';
import { Redis, RedisOptions } from 'ioredis';

export interface RedisConnectionOptions {
  host?: string;
  port?: number;
  password?: string;
  db?: number;
}

/**
 * Redis 连接管理器
 * 负责管理共享的 Redis 连接。连接在 onApplicationShutdown 中关闭，
 * 晚于所有 onModuleDestroy，保证 Worker 先关闭
 */
@Injectable()
export class RedisConnectionManager implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisConnectionManager.name);
  private readonly connections = new Map<string, Redis>();

  /**
   * 获取或创建 Redis 连接
   */
  getConnection(name: string, redisOptions: RedisConnectionOptions): Redis {
    const existing = this.connections.get(name);
    if (existing) {
      return existing;
    }

    const connection: RedisOptions = {
      host: redisOptions.host || 'localhost',
      port: redisOptions.port || 6379,
      // BullMQ Worker 要求阻塞连接不限制重试次数
      maxRetriesPerRequest: null,
    };

    if (redisOptions.password) {
      connection.password = redisOptions.password;
    }

    if (redisOptions.db !== undefined && redisOptions.db !== 0) {
      connection.db = redisOptions.db;
    }

    const redis = new Redis(connection);
    this.connections.set(name, redis);

    this.logger.log(`Created Redis connection: ${name}`);
    return redis;
  }

  /**
   * 优雅关闭所有连接
   */
  async onApplicationShutdown() {
    this.logger.log('Closing all Redis connections...');

    const closePromises = Array.from(this.connections.entries()).map(async ([name, redis]) => {
      if (redis.status !== 'ready') {
        this.logger.log(`Redis connection ${name} already closed (status: ${redis.status})`);
        return;
      }

      try {
        await redis.quit();
        this.logger.log(`Redis connection closed: ${name}`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        // 连接已被对端关闭时无需再报错
        if (!message.includes('Connection is closed')) {
          this.logger.error(`Error closing Redis connection ${name}:`, error);
        }
      }
    });

    await Promise.all(closePromises);
    this.connections.clear();
    this.logger.log('All Redis connections closed');
  }
}
