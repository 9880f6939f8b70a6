import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DispatchedReport, DispatcherService, FormulaBlockedEvent } from 'nestjs-blocking-detector';

interface PowerSample {
  target: string;
  energyJoules: number;
  durationMs: number;
}

function isPowerSample(value: unknown): value is PowerSample {
  return (
    typeof value === 'object' &&
    value !== null &&
    'target' in value &&
    typeof value.target === 'string' &&
    'energyJoules' in value &&
    typeof value.energyJoules === 'number' &&
    'durationMs' in value &&
    typeof value.durationMs === 'number'
  );
}

@Injectable()
export class FormulaHandlerService implements OnModuleInit {
  private readonly logger = new Logger(FormulaHandlerService.name);

  constructor(private readonly dispatcherService: DispatcherService) {}

  onModuleInit() {
    this.dispatcherService.registerHandler(this.handleReport.bind(this));
    this.dispatcherService.onFormulaBlocked(this.handleBlocked.bind(this));
    this.logger.log('Formula handler and blocked listener registered');
  }

  /**
   * 根据能耗样本估算平均功率，样本不合法时抛出异常（产生 poison 通知）
   */
  private async handleReport(report: DispatchedReport): Promise<{ target: string; watts: number }> {
    if (!isPowerSample(report.payload)) {
      throw new Error(`Report ${report.dispatcherReportId} is not a power sample`);
    }

    const { target, energyJoules, durationMs } = report.payload;
    if (durationMs <= 0) {
      throw new Error(`Report ${report.dispatcherReportId} has a non positive duration`);
    }

    const watts = energyJoules / (durationMs / 1000);
    this.logger.log(`${report.formulaId} estimated ${watts.toFixed(2)} W for ${target}`);
    return { target, watts };
  }

  /**
   * 阻塞的 formula 直接替换为新实例
   */
  private async handleBlocked(event: FormulaBlockedEvent): Promise<void> {
    this.logger.warn(`Formula ${event.formulaId} blocked (last poison ${event.lastPoisonId}), replacing it`);
    await this.dispatcherService.replaceFormula(event.formulaId);
  }
}
