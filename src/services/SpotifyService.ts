import { Track } from '../models/Track.js';
import { Playlist } from '../models/Playlist.js';
import { SavedAlbum, FollowedArtist } from '../models/Library.js';
import {
  SpotifyArtistSchema,
  SpotifyFollowedArtistsResponseSchema,
  SpotifyPlaylist,
  SpotifyPlaylistSchema,
  SpotifySavedAlbumItemSchema,
  SpotifySavedTrackItemSchema,
} from '../models/SpotifyTypes.js';
import {
  ManejadorErrores,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  ConfiguracionReintento,
  FuncionDormir,
} from '../utils/ErrorHandler.js';
import { Logger, silentLogger } from '../utils/Logger.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { AxiosTransport, HttpTransport } from './HttpTransport.js';
import { Paginator } from './Paginator.js';
import { PlaylistFanOut } from './PlaylistFanOut.js';
import { serializeAlbum, serializeArtist, serializeSavedTrack } from './SpotifySerializer.js';

export interface SpotifyServiceOptions {
  apiBaseUrl?: string;
  transport?: HttpTransport;
  retry?: Partial<ConfiguracionReintento>;
  concurrency?: number;
  logger?: Logger;
  signal?: AbortSignal;
  dormir?: FuncionDormir;
}

/**
 * Servicio para leer la biblioteca del usuario desde la API de Spotify.
 * Cada método recorre todas las páginas y devuelve registros normalizados.
 */
export class SpotifyService {
  private readonly apiBaseUrl: string;
  private readonly paginator: Paginator;
  private readonly fanOut: PlaylistFanOut;
  private readonly logger: Logger;

  constructor(accessToken: string, options: SpotifyServiceOptions = {}) {
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_CONFIG.API_BASE_URL).replace(/\/+$/, '');
    this.logger = options.logger ?? silentLogger;

    const manejadorErrores = new ManejadorErrores(
      { ...CONFIGURACION_REINTENTO_PREDETERMINADA, ...options.retry },
      { logger: this.logger, dormir: options.dormir }
    );

    this.paginator = new Paginator(accessToken, {
      transport: options.transport ?? new AxiosTransport(),
      manejadorErrores,
      logger: this.logger,
      signal: options.signal,
    });

    this.fanOut = new PlaylistFanOut(playlistId => this.getPlaylistTracks(playlistId), {
      concurrency: options.concurrency,
      logger: this.logger,
      signal: options.signal,
    });
  }

  /**
   * Canciones guardadas ("Tus me gusta")
   */
  async getSavedTracks(): Promise<Track[]> {
    const inicio = Date.now();
    const items = await this.paginator.collect(
      `${this.apiBaseUrl}/v1/me/tracks?limit=${DEFAULT_CONFIG.PAGE_LIMIT}`,
      SpotifySavedTrackItemSchema,
      'getSavedTracks'
    );

    const tracks = items.map(serializeSavedTrack);
    this.logTiming(`${tracks.length} canciones guardadas`, inicio);
    return tracks;
  }

  /**
   * Playlists del usuario con todas sus canciones, en el orden del listado
   */
  async getUserPlaylists(): Promise<Playlist[]> {
    const inicio = Date.now();
    const metadata = await this.getPlaylistsMetadata();
    const playlists = await this.fanOut.populate(metadata);
    this.logTiming(`${playlists.length} playlists`, inicio);
    return playlists;
  }

  /**
   * Solo los metadatos de las playlists, sin canciones
   */
  async getPlaylistsMetadata(): Promise<SpotifyPlaylist[]> {
    return this.paginator.collect(
      `${this.apiBaseUrl}/v1/me/playlists?limit=${DEFAULT_CONFIG.PAGE_LIMIT}`,
      SpotifyPlaylistSchema,
      'getUserPlaylists'
    );
  }

  /**
   * Canciones de una playlist. Las entradas sin canción (locales o eliminadas) se omiten.
   */
  async getPlaylistTracks(playlistId: string): Promise<Track[]> {
    const url = new URL(`${this.apiBaseUrl}/v1/playlists/${encodeURIComponent(playlistId)}/tracks`);
    url.searchParams.set('fields', DEFAULT_CONFIG.PLAYLIST_TRACK_FIELDS);
    url.searchParams.set('limit', String(DEFAULT_CONFIG.PLAYLIST_TRACKS_PAGE_LIMIT));

    const items = await this.paginator.collect(
      url.toString(),
      SpotifySavedTrackItemSchema,
      `getPlaylistTracks(${playlistId})`
    );

    return items.filter(item => item.track).map(serializeSavedTrack);
  }

  async getSavedAlbums(): Promise<SavedAlbum[]> {
    const inicio = Date.now();
    const items = await this.paginator.collect(
      `${this.apiBaseUrl}/v1/me/albums?limit=${DEFAULT_CONFIG.PAGE_LIMIT}`,
      SpotifySavedAlbumItemSchema,
      'getSavedAlbums'
    );

    const albums = items.map(serializeAlbum);
    this.logTiming(`${albums.length} álbumes guardados`, inicio);
    return albums;
  }

  /**
   * Artistas seguidos. Este endpoint pagina por cursor y anida la página bajo `artists`.
   */
  async getFollowedArtists(): Promise<FollowedArtist[]> {
    const inicio = Date.now();
    const items = await this.paginator.collectByCursor(
      `${this.apiBaseUrl}/v1/me/following?type=artist&limit=${DEFAULT_CONFIG.PAGE_LIMIT}`,
      SpotifyArtistSchema,
      'getFollowedArtists',
      SpotifyFollowedArtistsResponseSchema,
      response => response.artists
    );

    const artists = items.map(serializeArtist);
    this.logTiming(`${artists.length} artistas seguidos`, inicio);
    return artists;
  }

  private logTiming(descripcion: string, inicio: number): void {
    const segundos = ((Date.now() - inicio) / 1000).toFixed(2);
    this.logger.info(`Procesados ${descripcion} en ${segundos} segundos`);
  }
}
