import { Injectable } from '@nestjs/common';
import { DispatchReceipt, DispatcherService, FormulaRuntimeStatus } from 'nestjs-blocking-detector';

@Injectable()
export class AppService {
  constructor(private readonly dispatcherService: DispatcherService) {}

  async dispatchReport(formulaId: string | undefined, payload: unknown): Promise<DispatchReceipt[]> {
    if (formulaId) {
      return [await this.dispatcherService.dispatch(formulaId, payload)];
    }
    return this.dispatcherService.dispatchToAll(payload);
  }

  getFormulaStatus(): FormulaRuntimeStatus[] {
    return this.dispatcherService.getFormulaStatus();
  }

  async replaceFormula(formulaId: string): Promise<void> {
    await this.dispatcherService.replaceFormula(formulaId);
  }
}
