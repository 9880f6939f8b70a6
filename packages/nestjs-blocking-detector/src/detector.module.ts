import { Module, DynamicModule, Provider, ModuleMetadata, InjectionToken, OptionalFactoryDependency } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { Redis } from 'ioredis';
import { DetectorRegistry } from './dispatcher/detector.registry';
import { DispatcherService } from './dispatcher/dispatcher.service';
import { BullFormulaWorkerFactory, FormulaWorkerFactory } from './dispatcher/formula-worker.factory';
import { RedisConnectionManager } from './common/redis-connection.manager';
import {
  DetectorModuleOptions,
  ResolvedDetectorOptions,
} from './common/interfaces/detector-module-options.interface';
import { DetectorConfig, detectorConfig } from './config/config';
import { validateDetectorConfig } from './config/config.schema';

// Token 常量
export const DETECTOR_MODULE_OPTIONS = 'DETECTOR_MODULE_OPTIONS';
export const DETECTOR_OPTIONS = 'DETECTOR_OPTIONS';
export const DETECTOR_REDIS_CONNECTION = 'DETECTOR_REDIS_CONNECTION';
export const FORMULA_WORKER_FACTORY = 'FORMULA_WORKER_FACTORY';

export interface DetectorModuleAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
  useFactory: (...args: any[]) => Promise<DetectorModuleOptions> | DetectorModuleOptions;
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}

/**
 * 合并模块选项与环境变量配置，模块选项优先
 */
export function resolveDetectorOptions(
  options: DetectorModuleOptions,
  config: DetectorConfig,
): ResolvedDetectorOptions {
  const { redisOptions = {}, queueOptions = {}, supervisionOptions = {} } = options;

  const validated = validateDetectorConfig({
    redisHost: redisOptions.host ?? config.redisHost,
    redisPort: redisOptions.port ?? config.redisPort,
    redisPassword: redisOptions.password ?? config.redisPassword,
    redisDb: redisOptions.db ?? config.redisDb,
    formulaQueuePrefix: queueOptions.formulaQueuePrefix ?? config.formulaQueuePrefix,
    supervisionInterval: supervisionOptions.interval ?? config.supervisionInterval,
  });

  return {
    formulaIds: options.formulaIds ?? [],
    redis: {
      host: validated.redisHost,
      port: validated.redisPort,
      password: validated.redisPassword,
      db: validated.redisDb,
    },
    formulaQueuePrefix: validated.formulaQueuePrefix,
    supervisionInterval: validated.supervisionInterval,
  };
}

const createCoreProviders = (): Provider[] => [
  {
    provide: DETECTOR_OPTIONS,
    useFactory: (options: DetectorModuleOptions, config: ConfigType<typeof detectorConfig>) =>
      resolveDetectorOptions(options, config),
    inject: [DETECTOR_MODULE_OPTIONS, detectorConfig.KEY],
  },
  // Redis 连接管理器
  RedisConnectionManager,
  // 所有 formula 共享的 Redis 连接
  {
    provide: DETECTOR_REDIS_CONNECTION,
    useFactory: (options: ResolvedDetectorOptions, manager: RedisConnectionManager) =>
      manager.getConnection('detector', options.redis),
    inject: [DETECTOR_OPTIONS, RedisConnectionManager],
  },
  {
    provide: FORMULA_WORKER_FACTORY,
    useFactory: (options: ResolvedDetectorOptions, redis: Redis): FormulaWorkerFactory =>
      new BullFormulaWorkerFactory(redis, options.formulaQueuePrefix),
    inject: [DETECTOR_OPTIONS, DETECTOR_REDIS_CONNECTION],
  },
  DetectorRegistry,
  {
    provide: DispatcherService,
    useFactory: (options: ResolvedDetectorOptions, registry: DetectorRegistry, factory: FormulaWorkerFactory) =>
      new DispatcherService(options, registry, factory),
    inject: [DETECTOR_OPTIONS, DetectorRegistry, FORMULA_WORKER_FACTORY],
  },
];

@Module({})
export class DetectorModule {
  static forRoot(options: DetectorModuleOptions = {}): DynamicModule {
    return {
      module: DetectorModule,
      imports: [ConfigModule.forFeature(detectorConfig)],
      providers: [
        {
          provide: DETECTOR_MODULE_OPTIONS,
          useValue: options,
        },
        ...createCoreProviders(),
      ],
      exports: [DetectorRegistry, DispatcherService],
      global: true,
    };
  }

  static forRootAsync(options: DetectorModuleAsyncOptions): DynamicModule {
    return {
      module: DetectorModule,
      imports: [...(options.imports || []), ConfigModule.forFeature(detectorConfig)],
      providers: [
        {
          provide: DETECTOR_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        ...createCoreProviders(),
      ],
      exports: [DetectorRegistry, DispatcherService],
      global: true,
    };
  }
}
