import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ErrorRed } from '../utils/ErrorHandler.js';

export type MetodoHttp = 'GET' | 'POST';

export interface SolicitudHttp {
  method: MetodoHttp;
  url: string;
  headers: Record<string, string>;
  /** Cuerpo de formulario (application/x-www-form-urlencoded) */
  form?: Record<string, string>;
}

export interface RespuestaHttp {
  status: number;
  /** Headers con nombres en minúsculas */
  headers: Record<string, string>;
  body: unknown;
}

/**
 * Ejecuta exactamente una solicitud, sin interpretar el código de estado.
 * Una falla sin respuesta (timeout, conexión rechazada) se lanza como ErrorRed.
 */
export interface HttpTransport {
  send(solicitud: SolicitudHttp): Promise<RespuestaHttp>;
}

export interface AxiosTransportOptions {
  timeout?: number;
  adapter?: AxiosAdapter;
}

export class AxiosTransport implements HttpTransport {
  private client: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    this.client = axios.create({
      timeout: options.timeout ?? DEFAULT_CONFIG.REQUEST_TIMEOUT,
      adapter: options.adapter,
      // Los códigos de estado los interpreta el paginador, no el transporte
      validateStatus: () => true,
    });
  }

  async send(solicitud: SolicitudHttp): Promise<RespuestaHttp> {
    const headers = { ...solicitud.headers };
    let data: string | undefined;

    if (solicitud.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      data = new URLSearchParams(solicitud.form).toString();
    }

    try {
      const response = await this.client.request<unknown>({
        method: solicitud.method,
        url: solicitud.url,
        headers,
        data,
      });

      return {
        status: response.status,
        headers: this.normalizarHeaders(response.headers),
        body: response.data,
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const codigo = error.code ? ` (${error.code})` : '';
        throw new ErrorRed(`Error de red${codigo}: ${error.message}`, error);
      }
      throw error;
    }
  }

  private normalizarHeaders(headers: object): Record<string, string> {
    const normalizados: Record<string, string> = {};

    for (const [nombre, valor] of Object.entries(headers)) {
      if (typeof valor === 'string') {
        normalizados[nombre.toLowerCase()] = valor;
      } else if (typeof valor === 'number') {
        normalizados[nombre.toLowerCase()] = String(valor);
      } else if (Array.isArray(valor)) {
        normalizados[nombre.toLowerCase()] = valor.join(', ');
      }
    }

    return normalizados;
  }
}
