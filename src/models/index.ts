// Core data models
export * from './Track.js';
export * from './Playlist.js';
export * from './Library.js';

// Service-specific types
export * from './SpotifyTypes.js';
