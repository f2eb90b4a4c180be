export * from './models/index.js';
export * from './utils/index.js';
export { SpotifyService } from './services/SpotifyService.js';
export type { SpotifyServiceOptions } from './services/SpotifyService.js';
export { Paginator } from './services/Paginator.js';
export type { PageResult, PaginatorOptions } from './services/Paginator.js';
export { PlaylistFanOut } from './services/PlaylistFanOut.js';
export { AxiosTransport } from './services/HttpTransport.js';
export type { HttpTransport, SolicitudHttp, RespuestaHttp } from './services/HttpTransport.js';
export * from './services/SpotifySerializer.js';
export { LibraryExportApp } from './LibraryExportApp.js';
export type { AppConfig, AppDependencies } from './LibraryExportApp.js';
export { ConfigManager } from './config/ConfigManager.js';
export type { ExportConfig, ValidationResult } from './config/ConfigManager.js';
