import { createSpinner } from 'nanospinner';
import chalk from 'chalk';
import { LibrarySnapshot } from '../models/Library.js';

export class ProgressReporter {
  private startTime: Date;

  constructor(private readonly enabled: boolean = true) {
    this.startTime = new Date();
  }

  /**
   * Ejecutar un paso de la exportación mostrando un spinner mientras corre
   */
  async step<T>(label: string, task: () => Promise<T>, summarize: (result: T) => string): Promise<T> {
    if (!this.enabled) {
      return task();
    }

    const spinner = createSpinner(`${label}...`).start();
    try {
      const result = await task();
      spinner.success({ text: summarize(result) });
      return result;
    } catch (error) {
      spinner.error({ text: `${label}: falló` });
      throw error;
    }
  }

  start(): void {
    this.startTime = new Date();
  }

  /**
   * Mostrar resumen final de la exportación
   */
  displaySummary(snapshot: LibrarySnapshot): void {
    const processingTimeSeconds = Math.round(this.getElapsedTime() / 1000);
    const failedPlaylists = snapshot.playlists.filter(playlist => playlist.error !== undefined);
    const playlistTracks = snapshot.playlists.reduce((total, playlist) => total + playlist.tracks.length, 0);

    console.log('\n' + chalk.bold('🎵 ¡Exportación Completa!'));
    console.log('═'.repeat(50));

    console.log(chalk.bold('\n📚 Biblioteca:'));
    console.log(`   Canciones guardadas: ${chalk.cyan(snapshot.savedTracks.length)}`);
    console.log(`   Playlists: ${chalk.cyan(snapshot.playlists.length)} (${chalk.cyan(playlistTracks)} canciones)`);
    console.log(`   Álbumes guardados: ${chalk.cyan(snapshot.albums.length)}`);
    console.log(`   Artistas seguidos: ${chalk.cyan(snapshot.artists.length)}`);

    console.log(chalk.bold('\n⏱️ Rendimiento:'));
    console.log(`   Tiempo de procesamiento: ${chalk.yellow(processingTimeSeconds + 's')}`);

    if (failedPlaylists.length > 0) {
      console.log(`\n⚠️  ${failedPlaylists.length} playlists no se pudieron leer completas:`);
      failedPlaylists.forEach(playlist => {
        console.log(chalk.red(`   • ${playlist.name ?? playlist.id}: ${playlist.error}`));
      });
    }

    console.log('\n' + '═'.repeat(50));
  }

  /**
   * Obtener tiempo transcurrido desde que comenzó la exportación
   */
  getElapsedTime(): number {
    return Date.now() - this.startTime.getTime();
  }
}
