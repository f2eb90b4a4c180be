export { ProgressReporter } from './ProgressReporter.js';
export {
  ManejadorErrores,
  ErrorExportacion,
  ErrorNoAutorizado,
  ErrorProhibido,
  ErrorHttp,
  ErrorLimiteVelocidad,
  ErrorServidor,
  ErrorRed,
  ErrorRespuestaInvalida,
  ErrorCancelado,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  ESTADOS_REINTENTABLES,
  describirFalla,
  dormir,
} from './ErrorHandler.js';
export type { ConfiguracionReintento, CodigoError, FuncionDormir } from './ErrorHandler.js';
export { createConsoleLogger, silentLogger, LOG_LEVELS } from './Logger.js';
export type { Logger, LogLevel, LogMeta } from './Logger.js';
export { mapConcurrently } from './WorkerPool.js';
