import { IsString, IsNotEmpty, IsInt, Min, Max, validateSync } from 'class-validator';
import { MAX_DISPATCHER_REPORT_ID } from '../../detector/detector-state.enum';

/**
 * Poison 通知数据传输对象
 * 失败任务的 job.data 来自 Redis，转发给检测器之前需要校验
 */
export class PoisonNotificationDto {
  @IsString()
  @IsNotEmpty()
  formulaId!: string;

  @IsInt()
  @Min(0)
  @Max(MAX_DISPATCHER_REPORT_ID)
  dispatcherReportId!: number;
}

export type PoisonNotificationParseResult =
  | { ok: true; notification: PoisonNotificationDto }
  | { ok: false; errors: string[] };

export function parsePoisonNotification(data: unknown): PoisonNotificationParseResult {
  if (typeof data !== 'object' || data === null) {
    return { ok: false, errors: ['notification must be an object'] };
  }

  const dto = Object.assign(new PoisonNotificationDto(), data);
  const errors = validateSync(dto);
  if (errors.length > 0) {
    return {
      ok: false,
      errors: errors.flatMap((error) => Object.values(error.constraints ?? {})),
    };
  }

  return { ok: true, notification: dto };
}
