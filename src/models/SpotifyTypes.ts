import { z } from 'zod';

// Esquemas permisivos de la API de Spotify: cualquier campo puede faltar o venir en null

export const SpotifyImageSchema = z.object({
  url: z.string().nullish(),
  height: z.number().nullish(),
  width: z.number().nullish(),
});

export const SpotifyArtistRefSchema = z.object({
  name: z.string().nullish(),
});

export const SpotifyAlbumSchema = z.object({
  name: z.string().nullish(),
  release_date: z.string().nullish(),
  total_tracks: z.number().nullish(),
  images: z.array(SpotifyImageSchema).nullish(),
  artists: z.array(SpotifyArtistRefSchema).nullish(),
});

export const SpotifyTrackSchema = z.object({
  name: z.string().nullish(),
  duration_ms: z.number().nullish(),
  album: SpotifyAlbumSchema.nullish(),
  artists: z.array(SpotifyArtistRefSchema).nullish(),
});

export const SpotifySavedTrackItemSchema = z.object({
  added_at: z.string().nullish(),
  track: SpotifyTrackSchema.nullish(),
});

export const SpotifySavedAlbumItemSchema = z.object({
  added_at: z.string().nullish(),
  album: SpotifyAlbumSchema.nullish(),
});

export const SpotifyPlaylistSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  images: z.array(SpotifyImageSchema).nullish(),
  owner: z
    .object({
      id: z.string().nullish(),
      display_name: z.string().nullish(),
    })
    .nullish(),
});

export const SpotifyArtistSchema = z.object({
  name: z.string().nullish(),
  genres: z.array(z.string()).nullish(),
  images: z.array(SpotifyImageSchema).nullish(),
  followers: z
    .object({
      total: z.number().nullish(),
    })
    .nullish(),
});

// Páginas

export const SpotifyNextPageSchema = z.object({
  items: z.array(z.unknown()).nullish(),
  next: z.string().nullish(),
});

export const SpotifyCursorPageSchema = z.object({
  items: z.array(z.unknown()).nullish(),
  cursors: z
    .object({
      after: z.string().nullish(),
    })
    .nullish(),
});

export const SpotifyFollowedArtistsResponseSchema = z.object({
  artists: SpotifyCursorPageSchema.nullish(),
});

export type SpotifyImage = z.infer<typeof SpotifyImageSchema>;
export type SpotifyArtistRef = z.infer<typeof SpotifyArtistRefSchema>;
export type SpotifyAlbum = z.infer<typeof SpotifyAlbumSchema>;
export type SpotifyTrack = z.infer<typeof SpotifyTrackSchema>;
export type SpotifySavedTrackItem = z.infer<typeof SpotifySavedTrackItemSchema>;
export type SpotifySavedAlbumItem = z.infer<typeof SpotifySavedAlbumItemSchema>;
export type SpotifyPlaylist = z.infer<typeof SpotifyPlaylistSchema>;
export type SpotifyArtist = z.infer<typeof SpotifyArtistSchema>;
export type SpotifyNextPage = z.infer<typeof SpotifyNextPageSchema>;
export type SpotifyCursorPage = z.infer<typeof SpotifyCursorPageSchema>;
