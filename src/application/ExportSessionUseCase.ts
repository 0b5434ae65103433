import type { DecodeResult } from './dto/DecodeResult.js';
import type { ExportSummary, SessionExportPort } from '../domain/ports/SessionExportPort.js';
import { ExportFailedError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

/**
 * 匯出用例：把已 finalize 的解碼結果交給匯出埠
 *
 * 匯出失敗不影響 model 本身，包成 ExportFailedError（degradable）往上拋。
 */
export class ExportSessionUseCase {
  constructor(
    private readonly exporter: SessionExportPort,
    private readonly target: string,
    private readonly logger: Logger = new Logger('ExportSessionUseCase'),
  ) {}

  export(result: DecodeResult): ExportSummary {
    try {
      const summary = this.exporter.exportResult(result);
      this.logger.info('Session exported', { source: result.source, target: this.target, ...summary });
      return summary;
    } catch (err) {
      throw new ExportFailedError(this.target, { cause: err });
    }
  }
}
