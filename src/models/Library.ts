import { ArtistRef, Track } from './Track.js';
import { Playlist } from './Playlist.js';

export interface SavedAlbum {
  name: string | null;
  artists: ArtistRef[];
  releaseDate: string | null;
  totalTracks: number | null;
  imageUrl: string | null;
  addedAt: string | null;
}

export interface FollowedArtist {
  name: string | null;
  genres: string[];
  imageUrl: string | null;
  followers: number;
}

export interface LibrarySnapshot {
  exportedAt: string;
  savedTracks: Track[];
  playlists: Playlist[];
  albums: SavedAlbum[];
  artists: FollowedArtist[];
}
