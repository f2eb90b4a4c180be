import chalk from 'chalk';
import { SpotifyService } from './services/SpotifyService.js';
import { HttpTransport } from './services/HttpTransport.js';
import { ProgressReporter } from './utils/ProgressReporter.js';
import { LibrarySnapshot } from './models/Library.js';
import {
  ManejadorErrores,
  ConfiguracionReintento,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  FuncionDormir,
} from './utils/ErrorHandler.js';
import { Logger, createConsoleLogger, LogLevel } from './utils/Logger.js';
import { DEFAULT_CONFIG } from './config/defaults.js';

export interface AppConfig {
  token: string;
  apiBaseUrl: string;
  concurrency: number;
  retry: ConfiguracionReintento;
  logLevel: LogLevel;
  json: boolean;
}

export interface AppDependencies {
  transport?: HttpTransport;
  logger?: Logger;
  reporter?: ProgressReporter;
  dormir?: FuncionDormir;
  now?: () => Date;
}

export class LibraryExportApp {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly progressReporter: ProgressReporter;
  private readonly manejadorErrores: ManejadorErrores;
  private readonly abortController = new AbortController();

  constructor(config: Partial<AppConfig> & Pick<AppConfig, 'token'>, private readonly deps: AppDependencies = {}) {
    this.config = {
      apiBaseUrl: DEFAULT_CONFIG.API_BASE_URL,
      concurrency: DEFAULT_CONFIG.CONCURRENCY,
      retry: CONFIGURACION_REINTENTO_PREDETERMINADA,
      logLevel: DEFAULT_CONFIG.LOG_LEVEL,
      json: false,
      ...config,
    };

    this.logger = deps.logger ?? createConsoleLogger(this.config.logLevel);
    // En modo JSON stdout queda solo para la instantánea
    this.progressReporter = deps.reporter ?? new ProgressReporter(!this.config.json);
    this.manejadorErrores = new ManejadorErrores(this.config.retry, { logger: this.logger });
  }

  /**
   * Punto de entrada de la aplicación. Devuelve el código de salida del proceso.
   */
  async run(): Promise<number> {
    const onSigint = (): void => {
      console.error(chalk.yellow('\n⚠️  Cancelando exportación...'));
      this.cancel();
    };
    process.once('SIGINT', onSigint);

    try {
      this.progressReporter.start();
      const snapshot = await this.exportLibrary();

      if (this.config.json) {
        console.log(JSON.stringify(snapshot, null, 2));
      } else {
        this.progressReporter.displaySummary(snapshot);
      }
      return 0;

    } catch (error) {
      const exportError = this.manejadorErrores.clasificarError(error);
      console.error(chalk.red(`\n❌ ${this.manejadorErrores.obtenerMensajeAmigable(exportError)}`));
      this.logger.debug('Detalle del error', { codigo: exportError.codigo, mensaje: exportError.message });
      return 1;

    } finally {
      process.removeListener('SIGINT', onSigint);
    }
  }

  /**
   * Leer las cuatro colecciones, una después de la otra.
   * La fecha de exportación la asigna esta capa, no el servicio.
   */
  async exportLibrary(): Promise<LibrarySnapshot> {
    const spotifyService = new SpotifyService(this.config.token, {
      apiBaseUrl: this.config.apiBaseUrl,
      transport: this.deps.transport,
      retry: this.config.retry,
      concurrency: this.config.concurrency,
      logger: this.logger,
      signal: this.abortController.signal,
      dormir: this.deps.dormir,
    });

    const savedTracks = await this.progressReporter.step(
      'Obteniendo canciones guardadas',
      () => spotifyService.getSavedTracks(),
      tracks => `${tracks.length} canciones guardadas`
    );

    const playlists = await this.progressReporter.step(
      'Obteniendo playlists',
      () => spotifyService.getUserPlaylists(),
      result => `${result.length} playlists`
    );

    const albums = await this.progressReporter.step(
      'Obteniendo álbumes',
      () => spotifyService.getSavedAlbums(),
      result => `${result.length} álbumes`
    );

    const artists = await this.progressReporter.step(
      'Obteniendo artistas',
      () => spotifyService.getFollowedArtists(),
      result => `${result.length} artistas`
    );

    const now = this.deps.now ?? (() => new Date());
    return {
      exportedAt: now().toISOString(),
      savedTracks,
      playlists,
      albums,
      artists,
    };
  }

  /**
   * Dejar de emitir solicitudes nuevas; las que están en vuelo terminan solas
   */
  cancel(): void {
    this.abortController.abort();
  }
}
