export interface ArtistRef {
  name: string | null;
}

export interface AlbumRef {
  name: string | null;
  releaseDate: string | null;
  imageUrl: string | null;
}

export interface Track {
  name: string | null;
  album: AlbumRef;
  artists: ArtistRef[];
  duration: string | null; // "M:SS" o "H:MM:SS"
  addedAt?: string | null; // solo en canciones guardadas y de playlists
}
