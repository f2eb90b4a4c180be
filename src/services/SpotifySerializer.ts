import { Track, ArtistRef } from '../models/Track.js';
import { Playlist } from '../models/Playlist.js';
import { SavedAlbum, FollowedArtist } from '../models/Library.js';
import {
  SpotifyAlbum,
  SpotifyArtist,
  SpotifyArtistRef,
  SpotifyImage,
  SpotifyPlaylist,
  SpotifySavedAlbumItem,
  SpotifySavedTrackItem,
  SpotifyTrack,
} from '../models/SpotifyTypes.js';

/**
 * Convertir milisegundos a "M:SS", o "H:MM:SS" a partir de una hora
 */
export function formatDuration(ms: number | null | undefined): string | null {
  if (ms === null || ms === undefined) {
    return null;
  }

  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const ss = String(seconds).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

function firstImageUrl(images: SpotifyImage[] | null | undefined): string | null {
  return images?.[0]?.url ?? null;
}

function convertArtists(artists: SpotifyArtistRef[] | null | undefined): ArtistRef[] {
  return (artists ?? []).map(artist => ({ name: artist.name ?? null }));
}

export function serializeTrack(track: SpotifyTrack): Track {
  const album: SpotifyAlbum = track.album ?? {};

  return {
    name: track.name ?? null,
    album: {
      name: album.name ?? null,
      releaseDate: album.release_date ?? null,
      imageUrl: firstImageUrl(album.images),
    },
    artists: convertArtists(track.artists),
    duration: formatDuration(track.duration_ms),
  };
}

export function serializeSavedTrack(item: SpotifySavedTrackItem): Track {
  return {
    ...serializeTrack(item.track ?? {}),
    addedAt: item.added_at ?? null,
  };
}

export function serializePlaylist(playlist: SpotifyPlaylist, tracks: Track[]): Playlist {
  const owner: NonNullable<SpotifyPlaylist['owner']> = playlist.owner ?? {};

  return {
    id: playlist.id,
    name: playlist.name ?? null,
    description: playlist.description ?? null,
    owner: owner.display_name || owner.id || null,
    imageUrl: firstImageUrl(playlist.images),
    tracks,
  };
}

export function serializeAlbum(item: SpotifySavedAlbumItem): SavedAlbum {
  const album: SpotifyAlbum = item.album ?? {};

  return {
    name: album.name ?? null,
    artists: convertArtists(album.artists),
    releaseDate: album.release_date ?? null,
    totalTracks: album.total_tracks ?? null,
    imageUrl: firstImageUrl(album.images),
    addedAt: item.added_at ?? null,
  };
}

export function serializeArtist(artist: SpotifyArtist): FollowedArtist {
  return {
    name: artist.name ?? null,
    genres: artist.genres ?? [],
    imageUrl: firstImageUrl(artist.images),
    followers: artist.followers?.total ?? 0,
  };
}
