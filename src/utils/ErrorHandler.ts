import { z } from 'zod';
import type { RespuestaHttp } from '../services/HttpTransport.js';
import { Logger, silentLogger } from './Logger.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export type CodigoError =
  | 'NO_AUTORIZADO'
  | 'PROHIBIDO'
  | 'LIMITE_VELOCIDAD'
  | 'ERROR_SERVIDOR'
  | 'ERROR_HTTP'
  | 'ERROR_RED'
  | 'RESPUESTA_INVALIDA'
  | 'CANCELADO'
  | 'ERROR_DESCONOCIDO';

export class ErrorExportacion extends Error {
  constructor(
    mensaje: string,
    public readonly codigo: CodigoError,
    public readonly errorOriginal?: unknown
  ) {
    super(mensaje);
    this.name = 'ErrorExportacion';
  }
}

/** 401: el token expiró o es inválido. Aborta toda la sesión. */
export class ErrorNoAutorizado extends ErrorExportacion {
  constructor(mensaje: string = 'Token de acceso expirado o inválido') {
    super(mensaje, 'NO_AUTORIZADO');
    this.name = 'ErrorNoAutorizado';
  }
}

/** 403: el usuario no está registrado para esta aplicación en el Developer Dashboard. */
export class ErrorProhibido extends ErrorExportacion {
  constructor(mensaje: string = 'Usuario no registrado en el Spotify Developer Dashboard') {
    super(mensaje, 'PROHIBIDO');
    this.name = 'ErrorProhibido';
  }
}

export class ErrorHttp extends ErrorExportacion {
  constructor(
    mensaje: string,
    public readonly estado: number,
    codigo: CodigoError = 'ERROR_HTTP'
  ) {
    super(mensaje, codigo);
    this.name = 'ErrorHttp';
  }
}

export class ErrorLimiteVelocidad extends ErrorHttp {
  constructor(mensaje: string) {
    super(mensaje, 429, 'LIMITE_VELOCIDAD');
    this.name = 'ErrorLimiteVelocidad';
  }
}

export class ErrorServidor extends ErrorHttp {
  constructor(mensaje: string, estado: number) {
    super(mensaje, estado, 'ERROR_SERVIDOR');
    this.name = 'ErrorServidor';
  }
}

export class ErrorRed extends ErrorExportacion {
  constructor(mensaje: string, errorOriginal?: unknown) {
    super(mensaje, 'ERROR_RED', errorOriginal);
    this.name = 'ErrorRed';
  }
}

export class ErrorRespuestaInvalida extends ErrorExportacion {
  constructor(mensaje: string, errorOriginal?: unknown) {
    super(mensaje, 'RESPUESTA_INVALIDA', errorOriginal);
    this.name = 'ErrorRespuestaInvalida';
  }
}

export class ErrorCancelado extends ErrorExportacion {
  constructor(mensaje: string = 'Exportación cancelada') {
    super(mensaje, 'CANCELADO');
    this.name = 'ErrorCancelado';
  }
}

/**
 * Descripción corta de una falla aislada (por ejemplo, las canciones de una
 * playlist), usada como anotación en el registro afectado
 */
export function describirFalla(error: unknown): string {
  if (error instanceof ErrorHttp) {
    return `HTTP Error ${error.estado}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export interface ConfiguracionReintento {
  maxReintentos: number;
  retrasoBase: number;
  retrasoMaximo: number;
  multiplicadorRetroceso: number;
  reintentarErroresRed: boolean;
}

export const CONFIGURACION_REINTENTO_PREDETERMINADA: ConfiguracionReintento = {
  maxReintentos: DEFAULT_CONFIG.MAX_RETRIES,
  retrasoBase: DEFAULT_CONFIG.RETRY_INITIAL_DELAY,
  retrasoMaximo: DEFAULT_CONFIG.RETRY_MAX_DELAY,
  multiplicadorRetroceso: DEFAULT_CONFIG.RETRY_BACKOFF_MULTIPLIER,
  reintentarErroresRed: DEFAULT_CONFIG.RETRY_NETWORK_ERRORS,
};

export const ESTADOS_REINTENTABLES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export type FuncionDormir = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Dormir por los milisegundos especificados; la señal de cancelación interrumpe la espera
 */
export const dormir: FuncionDormir = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new ErrorCancelado());
      return;
    }

    const alCancelar = (): void => {
      clearTimeout(temporizador);
      reject(new ErrorCancelado());
    };
    const temporizador = setTimeout(() => {
      signal?.removeEventListener('abort', alCancelar);
      resolve();
    }, ms);

    signal?.addEventListener('abort', alCancelar, { once: true });
  });

export interface OpcionesManejadorErrores {
  logger?: Logger;
  dormir?: FuncionDormir;
}

const CuerpoErrorSpotifySchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

export class ManejadorErrores {
  private readonly logger: Logger;
  private readonly dormir: FuncionDormir;

  constructor(
    private readonly configuracion: ConfiguracionReintento = CONFIGURACION_REINTENTO_PREDETERMINADA,
    opciones: OpcionesManejadorErrores = {}
  ) {
    this.logger = opciones.logger ?? silentLogger;
    this.dormir = opciones.dormir ?? dormir;
  }

  /**
   * Ejecutar una solicitud con reintentos y retroceso exponencial.
   *
   * Devuelve la primera respuesta que no requiere otro intento, o la última
   * respuesta una vez agotados los reintentos. Nunca lanza por un código de estado:
   * quien llama inspecciona la respuesta. Las esperas por 429 con `Retry-After`
   * no consumen intentos.
   */
  async ejecutarConReintento(
    operacion: () => Promise<RespuestaHttp>,
    nombreOperacion?: string,
    signal?: AbortSignal
  ): Promise<RespuestaHttp> {
    const descripcionOperacion = nombreOperacion ? ` para ${nombreOperacion}` : '';
    let intento = 0;

    for (;;) {
      let respuesta: RespuestaHttp;
      try {
        respuesta = await operacion();
      } catch (error) {
        if (
          !(error instanceof ErrorRed) ||
          !this.configuracion.reintentarErroresRed ||
          intento >= this.configuracion.maxReintentos
        ) {
          throw error;
        }

        const retraso = this.calcularRetrasoRetroceso(intento);
        intento++;
        this.logger.warn(
          `Error de red${descripcionOperacion}. Reintentando en ${retraso}ms (intento ${intento}/${this.configuracion.maxReintentos}): ${error.message}`
        );
        await this.dormir(retraso, signal);
        continue;
      }

      if (!ESTADOS_REINTENTABLES.has(respuesta.status)) {
        return respuesta;
      }

      if (respuesta.status === 429) {
        const reintentarDespues = this.obtenerRetrasoReintentarDespues(respuesta);
        if (reintentarDespues !== null) {
          const espera = Math.min(reintentarDespues, this.configuracion.retrasoMaximo);
          this.logger.warn(`Límite de velocidad alcanzado${descripcionOperacion}. Esperando ${espera}ms`);
          await this.dormir(espera, signal);
          continue;
        }
      }

      if (intento >= this.configuracion.maxReintentos) {
        this.logger.error(
          `Fallaron los ${intento + 1} intentos${descripcionOperacion}. Último estado: ${respuesta.status}`
        );
        return respuesta;
      }

      const retraso = this.calcularRetrasoRetroceso(intento);
      intento++;
      this.logger.warn(
        `Intento ${intento} falló con estado ${respuesta.status}${descripcionOperacion}. Reintentando en ${retraso}ms`
      );
      await this.dormir(retraso, signal);
    }
  }

  /**
   * Retraso para el intento dado (empezando en 0), acotado por el máximo configurado
   */
  calcularRetrasoRetroceso(intento: number): number {
    const retraso =
      this.configuracion.retrasoBase * Math.pow(this.configuracion.multiplicadorRetroceso, intento);
    return Math.min(retraso, this.configuracion.retrasoMaximo);
  }

  /**
   * Convertir una respuesta no exitosa en el error terminal correspondiente.
   * Devuelve null para respuestas 2xx.
   */
  clasificarRespuesta(respuesta: RespuestaHttp): ErrorExportacion | null {
    const estado = respuesta.status;
    if (estado >= 200 && estado < 300) {
      return null;
    }

    const detalle = this.obtenerMensajeCuerpo(respuesta.body);

    if (estado === 401) {
      return new ErrorNoAutorizado(detalle);
    }
    if (estado === 403) {
      return new ErrorProhibido(detalle);
    }
    if (estado === 429) {
      return new ErrorLimiteVelocidad(detalle ?? 'Límite de velocidad alcanzado y reintentos agotados');
    }
    if (estado >= 500) {
      return new ErrorServidor(detalle ?? `Servicio no disponible (${estado})`, estado);
    }
    return new ErrorHttp(detalle ?? `Error HTTP (${estado})`, estado);
  }

  /**
   * Normalizar cualquier valor lanzado a un ErrorExportacion
   */
  clasificarError(error: unknown): ErrorExportacion {
    if (error instanceof ErrorExportacion) {
      return error;
    }
    if (error instanceof Error) {
      return new ErrorExportacion(error.message, 'ERROR_DESCONOCIDO', error);
    }
    return new ErrorExportacion('Ocurrió un error desconocido', 'ERROR_DESCONOCIDO', error);
  }

  /**
   * Obtener retraso de reintento desde el header Retry-After (en segundos)
   */
  private obtenerRetrasoReintentarDespues(respuesta: RespuestaHttp): number | null {
    const reintentarDespues = respuesta.headers['retry-after'];
    if (reintentarDespues === undefined || reintentarDespues.trim() === '') {
      return null;
    }

    const segundos = Number(reintentarDespues);
    if (!Number.isFinite(segundos) || segundos < 0) {
      return null;
    }
    return segundos * 1000;
  }

  private obtenerMensajeCuerpo(cuerpo: unknown): string | undefined {
    const resultado = CuerpoErrorSpotifySchema.safeParse(cuerpo);
    return resultado.success ? resultado.data.error.message : undefined;
  }

  /**
   * Obtener mensaje de error amigable para mostrar al usuario
   */
  obtenerMensajeAmigable(error: ErrorExportacion): string {
    switch (error.codigo) {
      case 'NO_AUTORIZADO':
        return 'El token de acceso expiró o es inválido. Volvé a autenticarte y ejecutá el comando nuevamente.';

      case 'PROHIBIDO':
        return 'Spotify rechazó el acceso. Verificá que tu usuario esté registrado en el Developer Dashboard de tu aplicación.';

      case 'LIMITE_VELOCIDAD':
        return 'Spotify siguió limitando las solicitudes después de todos los reintentos. Esperá unos minutos e intentá de nuevo.';

      case 'ERROR_RED':
        return `Error de conexión de red: ${error.message}. Verificá tu conexión a internet e intentá de nuevo.`;

      case 'ERROR_SERVIDOR':
        return `El servicio de Spotify no está disponible temporalmente (${error.message}). Intentá más tarde.`;

      case 'CANCELADO':
        return 'Exportación cancelada por el usuario.';

      default:
        return error.message;
    }
  }
}
