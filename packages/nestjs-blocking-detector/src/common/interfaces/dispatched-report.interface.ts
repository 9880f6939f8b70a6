/**
 * 发往 formula 执行队列的报告
 */
export interface DispatchedReport<TPayload = unknown> {
  /**
   * 接收该报告的 formula
   */
  formulaId: string;

  /**
   * 由该 formula 的阻塞检测器分配的 ID。
   * 报告在 formula 内处理失败时，该 ID 会作为 poison 通知回传给检测器。
   */
  dispatcherReportId: number;

  /**
   * 报告内容，检测器不关心其结构。
   */
  payload: TPayload;
}

/**
 * dispatch() 的返回值
 */
export interface DispatchReceipt {
  jobId: string | undefined;
  dispatcherReportId: number;
}
