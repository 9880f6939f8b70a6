/**
 * =======================================================================
 * Public API
 * =======================================================================
 * Entry point for nestjs-blocking-detector: the per-formula blocking
 * detector, the registry that owns one detector per formula, and the
 * BullMQ dispatcher that feeds poison notifications into it.
 * =======================================================================
 */
import 'reflect-metadata';

// ==============================================
//      PRIMARY MODULE AND CONFIGURATION
// ==============================================

export {
  DetectorModule,
  resolveDetectorOptions,
  DETECTOR_OPTIONS,
  DETECTOR_REDIS_CONNECTION,
  FORMULA_WORKER_FACTORY,
} from './detector.module';
export type { DetectorModuleAsyncOptions } from './detector.module';
export type {
  DetectorModuleOptions,
  ResolvedDetectorOptions,
} from './common/interfaces/detector-module-options.interface';
export { detectorConfig, loadDetectorConfig } from './config/config';
export type { DetectorConfig } from './config/config';
export { DetectorConfigSchema, validateDetectorConfig } from './config/config.schema';


// ==============================================
//      DETECTION CORE
// ==============================================

export { BlockingDetector } from './detector/blocking-detector';
export { MessageIdAllocator } from './detector/message-id-allocator';
export { DetectorState, MAX_DISPATCHER_REPORT_ID } from './detector/detector-state.enum';


// ==============================================
//      DISPATCH LAYER
// ==============================================

export { DetectorRegistry } from './dispatcher/detector.registry';
export { DispatcherService } from './dispatcher/dispatcher.service';
export type {
  ReportHandler,
  FormulaBlockedEvent,
  FormulaBlockedListener,
} from './dispatcher/dispatcher.service';
export { BullFormulaWorkerFactory } from './dispatcher/formula-worker.factory';
export type {
  FormulaQueue,
  FormulaWorker,
  FormulaWorkerFactory,
  FormulaWorkerHooks,
} from './dispatcher/formula-worker.factory';


// ==============================================
//      INTERFACES, DTOS & ERRORS
// ==============================================

export type { DispatchedReport, DispatchReceipt } from './common/interfaces/dispatched-report.interface';
export type { FormulaStatus, FormulaRuntimeStatus } from './common/interfaces/formula-status.interface';
export { PoisonNotificationDto, parsePoisonNotification } from './common/dtos/poison-notification.dto';
export {
  DetectorError,
  InvalidPoisonIdError,
  UnknownFormulaError,
  ConfigurationError,
} from './common/errors/detector.errors';
export { RedisConnectionManager } from './common/redis-connection.manager';
export type { RedisConnectionOptions } from './common/redis-connection.manager';
