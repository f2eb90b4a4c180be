import { Track } from './Track.js';

export interface Playlist {
  id: string;
  name: string | null;
  description: string | null;
  owner: string | null; // display name, o el id del dueño si no tiene
  imageUrl: string | null;
  tracks: Track[];
  error?: string; // presente cuando no se pudieron obtener las canciones
}
