import { Track } from '../models/Track.js';
import { Playlist } from '../models/Playlist.js';
import { SpotifyPlaylist } from '../models/SpotifyTypes.js';
import { ErrorCancelado, describirFalla } from '../utils/ErrorHandler.js';
import { Logger, silentLogger } from '../utils/Logger.js';
import { mapConcurrently } from '../utils/WorkerPool.js';
import { serializePlaylist } from './SpotifySerializer.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';

export interface PlaylistFanOutOptions {
  concurrency?: number;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Completa las canciones de cada playlist en paralelo, con concurrencia acotada.
 *
 * El resultado respeta el orden de la lista de entrada. Si falla una playlist
 * (incluso con 401/403) se devuelve igual, sin canciones y con `error`; las
 * demás siguen su curso. Solo la cancelación corta todo.
 */
export class PlaylistFanOut {
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(
    private readonly fetchTracks: (playlistId: string) => Promise<Track[]>,
    private readonly options: PlaylistFanOutOptions = {}
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONFIG.CONCURRENCY;
    this.logger = options.logger ?? silentLogger;
  }

  async populate(playlists: readonly SpotifyPlaylist[]): Promise<Playlist[]> {
    return mapConcurrently(
      playlists,
      this.concurrency,
      playlist => this.populateOne(playlist),
      this.options.signal
    );
  }

  private async populateOne(playlist: SpotifyPlaylist): Promise<Playlist> {
    try {
      const tracks = await this.fetchTracks(playlist.id);
      return serializePlaylist(playlist, tracks);
    } catch (error) {
      if (error instanceof ErrorCancelado) {
        throw error;
      }

      const falla = describirFalla(error);
      this.logger.error(`Error al obtener las canciones de la playlist ${playlist.id}`, { error: falla });
      return { ...serializePlaylist(playlist, []), error: falla };
    }
  }
}
