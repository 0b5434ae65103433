export { DecodeSessionUseCase, detectSessionKind, resolveFormatVersion } from './application/DecodeSessionUseCase.js';
export { ExportSessionUseCase } from './application/ExportSessionUseCase.js';
export { ModelBuilder } from './application/ModelBuilder.js';
export type { BuilderState, FinalizationReason, MalformedTolerance, ModelBuilderOptions } from './application/ModelBuilder.js';
export type { DecodeResult, DecodeStats } from './application/dto/DecodeResult.js';

export { loadConfig, parseTolerance } from './config/ConfigLoader.js';
export { DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config/defaults.js';
export type { DecoderConfig, OutputConfig, ExportConfig, LoggingConfig, RecoveryConfig, PartialConfig } from './config/types.js';

export type { Command, CommandKind } from './domain/commands/Command.js';
export type { DecodeOutcome, SessionKind } from './domain/commands/DecodeOutcome.js';
export { describeDiagnostic } from './domain/commands/Diagnostic.js';
export type { Diagnostic, DiagnosticKind } from './domain/commands/Diagnostic.js';
export type { NavigationEntry } from './domain/entities/NavigationEntry.js';
export type { FormField, FormState, FrameState, HttpBody, PageState } from './domain/entities/PageState.js';
export type { Tab, TabId, NavigationIndex } from './domain/entities/Tab.js';
export type { Window, WindowBounds, WindowId, WindowShowState } from './domain/entities/Window.js';
export {
  SessionRecoveryError,
  ExportFailedError,
  InvalidSessionHeaderError,
  SessionFileUnreadableError,
  ConfigValidationError,
} from './domain/errors/DomainErrors.js';
export { SessionModel } from './domain/model/SessionModel.js';
export type { ByteSourcePort } from './domain/ports/ByteSourcePort.js';
export type { ExportSummary, SessionExportPort } from './domain/ports/SessionExportPort.js';
export { ChromeTimestamp } from './domain/value-objects/ChromeTimestamp.js';
export { PageTransition } from './domain/value-objects/PageTransition.js';

export { PickleReader } from './infrastructure/pickle/PickleReader.js';
export { decodePageState } from './infrastructure/pickle/PageStateDecoder.js';
export { parseFormState } from './infrastructure/pickle/FormStateParser.js';
export { CommandDecoder } from './infrastructure/snss/CommandDecoder.js';
export { COMMAND_SCHEMAS, findCommandSchema } from './infrastructure/snss/commandSchemas.js';
export { RecordStream, SNSS_MAGIC } from './infrastructure/snss/RecordStream.js';
export type { RawRecord, RecordStreamItem, SessionFileHeader } from './infrastructure/snss/RecordStream.js';
export { BufferByteSource } from './infrastructure/source/BufferByteSource.js';
export { FileByteSource } from './infrastructure/source/FileByteSource.js';
export { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
export { SqliteSessionExporter } from './infrastructure/sqlite/SqliteSessionExporter.js';

export type { DecodeFault, DecodeFaultCode, ParseResult } from './shared/ParseResult.js';
export { Logger } from './shared/Logger.js';
export type { LogLevel } from './shared/Logger.js';
