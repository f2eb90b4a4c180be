import { z } from 'zod';
import { HttpTransport, SolicitudHttp } from './HttpTransport.js';
import {
  ErrorCancelado,
  ErrorRespuestaInvalida,
  ManejadorErrores,
} from '../utils/ErrorHandler.js';
import { Logger, silentLogger } from '../utils/Logger.js';
import {
  SpotifyCursorPage,
  SpotifyNextPageSchema,
} from '../models/SpotifyTypes.js';

export type Esquema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface PageResult<T> {
  items: T[];
  /** URL de la próxima página o token `after`; null cuando no hay más */
  cursor: string | null;
  totalFetched: number;
}

export interface PaginatorOptions {
  transport: HttpTransport;
  manejadorErrores: ManejadorErrores;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Recorre colecciones paginadas de la API acumulando los items en el orden recibido.
 *
 * Soporta dos protocolos: URL `next` absoluta, o cursor `after` que se agrega a una
 * URL base fija. Una página vacía con cursor no termina el recorrido.
 */
export class Paginator {
  private readonly logger: Logger;

  constructor(
    private readonly accessToken: string,
    private readonly options: PaginatorOptions
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Seguir las URLs `next` hasta que sean null
   */
  async collect<T>(url: string, itemSchema: Esquema<T>, operacion: string): Promise<T[]> {
    const results: T[] = [];
    let nextUrl: string | null = url;

    while (nextUrl) {
      const body = await this.fetchPage(nextUrl, operacion);
      const page = this.parse(SpotifyNextPageSchema, body, operacion);

      const result: PageResult<T> = {
        items: this.parseItems(page.items ?? [], itemSchema, operacion),
        cursor: page.next || null,
        totalFetched: 0,
      };
      results.push(...result.items);
      result.totalFetched = results.length;
      this.logPage(operacion, result);

      nextUrl = result.cursor;
    }

    return results;
  }

  /**
   * Paginación por cursor: la próxima URL es `baseUrl` + `after=<token>`.
   * `select` extrae la página de cursor cuando la respuesta la anida (p. ej. bajo `artists`).
   */
  async collectByCursor<T, P>(
    baseUrl: string,
    itemSchema: Esquema<T>,
    operacion: string,
    pageSchema: Esquema<P>,
    select: (page: P) => SpotifyCursorPage | null | undefined
  ): Promise<T[]> {
    const results: T[] = [];
    let nextUrl: string | null = baseUrl;

    while (nextUrl) {
      const body = await this.fetchPage(nextUrl, operacion);
      const page: SpotifyCursorPage = select(this.parse(pageSchema, body, operacion)) ?? {};

      const result: PageResult<T> = {
        items: this.parseItems(page.items ?? [], itemSchema, operacion),
        cursor: page.cursors?.after || null,
        totalFetched: 0,
      };
      results.push(...result.items);
      result.totalFetched = results.length;
      this.logPage(operacion, result);

      nextUrl = result.cursor ? this.withAfter(baseUrl, result.cursor) : null;
    }

    return results;
  }

  private async fetchPage(url: string, operacion: string): Promise<unknown> {
    const { transport, manejadorErrores, signal } = this.options;

    if (signal?.aborted) {
      throw new ErrorCancelado();
    }

    const solicitud: SolicitudHttp = {
      method: 'GET',
      url,
      headers: { Authorization: `Bearer ${this.accessToken}` },
    };

    const respuesta = await manejadorErrores.ejecutarConReintento(
      () => transport.send(solicitud),
      operacion,
      signal
    );

    // 401/403 cortan aquí: no se devuelve nada de lo acumulado
    const error = manejadorErrores.clasificarRespuesta(respuesta);
    if (error) {
      throw error;
    }

    return respuesta.body;
  }

  private parseItems<T>(items: unknown[], itemSchema: Esquema<T>, operacion: string): T[] {
    return items.map(item => this.parse(itemSchema, item, operacion));
  }

  private parse<T>(schema: Esquema<T>, value: unknown, operacion: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ErrorRespuestaInvalida(
        `Respuesta inesperada de la API en ${operacion}: ${result.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ')}`,
        result.error
      );
    }
    return result.data;
  }

  private withAfter(baseUrl: string, after: string): string {
    const url = new URL(baseUrl);
    url.searchParams.set('after', after);
    return url.toString();
  }

  private logPage<T>(operacion: string, page: PageResult<T>): void {
    this.logger.debug(`Página recibida en ${operacion}`, {
      items: page.items.length,
      totalFetched: page.totalFetched,
      cursor: page.cursor,
    });
  }
}
