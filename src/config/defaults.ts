/**
 * Configuración por defecto para la exportación
 */
export const DEFAULT_CONFIG = {
  // API de Spotify (se puede sobreescribir con SPOTIFY_API_URL para pruebas)
  API_BASE_URL: 'https://api.spotify.com',

  // Timeout por solicitud
  REQUEST_TIMEOUT: 30000,

  // Configuración de reintentos
  MAX_RETRIES: 5,
  RETRY_INITIAL_DELAY: 1000,
  RETRY_MAX_DELAY: 60000,
  RETRY_BACKOFF_MULTIPLIER: 2,
  RETRY_NETWORK_ERRORS: false,

  // Playlists procesadas en paralelo
  CONCURRENCY: 10,

  // Tamaños de página
  PAGE_LIMIT: 50,
  PLAYLIST_TRACKS_PAGE_LIMIT: 100,

  // Campos pedidos al listar canciones de una playlist
  PLAYLIST_TRACK_FIELDS:
    'items(added_at,track(name,duration_ms,album(name,release_date,images),artists(name))),next',

  LOG_LEVEL: 'error',
} as const;

/**
 * Mensajes de ayuda y información
 */
export const HELP_MESSAGES = {
  WELCOME: '🎵 Exportador de Biblioteca de Spotify',
  DESCRIPTION: 'Exporta tus canciones guardadas, playlists, álbumes y artistas seguidos',

  TOKEN_MISSING: `
❌ No se encontró un token de acceso.

Pasalo con --token <token> o definí la variable de entorno SPOTIFY_TOKEN
(también se lee desde un archivo .env en este directorio).

El token necesita los scopes:
  user-library-read user-follow-read playlist-read-private playlist-read-collaborative
`,
} as const;
