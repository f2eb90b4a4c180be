import chalk from 'chalk';
import { LibraryExportApp } from '../LibraryExportApp.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { DEFAULT_CONFIG, HELP_MESSAGES } from '../config/defaults.js';
import { LogLevel } from '../utils/Logger.js';

export interface CLIOptions {
  token?: string;
  apiUrl?: string;
  concurrency?: number;
  maxRetries?: number;
  verbose?: boolean;
  json?: boolean;
  help?: boolean;
}

export class LibraryExportCLI {
  constructor(
    private readonly options: CLIOptions = {},
    private readonly configManager: ConfigManager = new ConfigManager()
  ) {}

  async main(): Promise<number> {
    if (this.options.help) {
      LibraryExportCLI.showHelp();
      return 0;
    }

    // Los flags tienen prioridad sobre el entorno y pasan por las mismas validaciones
    const configManager = this.configManager.withOverrides({
      SPOTIFY_TOKEN: this.options.token,
      SPOTIFY_API_URL: this.options.apiUrl,
      EXPORT_CONCURRENCY: this.options.concurrency?.toString(),
      EXPORT_MAX_RETRIES: this.options.maxRetries?.toString(),
    });

    const validation = configManager.validate();
    if (!validation.isValid) {
      console.error(chalk.red('\n❌ Configuración inválida:'));
      validation.errors.forEach(error => console.error(chalk.red(`   • ${error}`)));
      return 1;
    }

    const config = configManager.load();
    const token = config.token;
    if (!token) {
      console.error(chalk.red(HELP_MESSAGES.TOKEN_MISSING));
      console.error(chalk.gray(`   Variables faltantes: ${validation.missingFields.join(', ')}`));
      return 1;
    }

    let logLevel: LogLevel = config.logLevel;
    if (this.options.verbose) {
      logLevel = 'info';
    }

    if (!this.options.json) {
      console.log(chalk.bold(`\n${HELP_MESSAGES.WELCOME}`));
      console.log(chalk.gray(HELP_MESSAGES.DESCRIPTION));
      console.log(chalk.gray('─'.repeat(60)));
    }

    const app = new LibraryExportApp({
      token,
      apiBaseUrl: config.apiBaseUrl,
      concurrency: config.concurrency,
      retry: config.retry,
      logLevel,
      json: this.options.json ?? false,
    });

    return app.run();
  }

  /**
   * Parse command line arguments
   */
  static parseArguments(args: string[]): CLIOptions {
    const options: CLIOptions = {};

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      switch (arg) {
        case '--token':
        case '-t':
          if (args[i + 1] !== undefined) {
            options.token = args[i + 1];
            i++; // Skip next argument
          }
          break;

        case '--api-url':
          if (args[i + 1] !== undefined) {
            options.apiUrl = args[i + 1];
            i++;
          }
          break;

        case '--concurrency':
        case '-c': {
          const concurrency = parseInt(args[i + 1], 10);
          if (!isNaN(concurrency)) {
            options.concurrency = concurrency;
            i++;
          }
          break;
        }

        case '--max-retries':
        case '-r': {
          const retries = parseInt(args[i + 1], 10);
          if (!isNaN(retries)) {
            options.maxRetries = retries;
            i++;
          }
          break;
        }

        case '--verbose':
        case '-v':
          options.verbose = true;
          break;

        case '--json':
          options.json = true;
          break;

        case '--help':
        case '-h':
          options.help = true;
          break;
      }
    }

    return options;
  }

  /**
   * Display help information
   */
  static showHelp(): void {
    console.log(chalk.bold(`\n${HELP_MESSAGES.WELCOME}\n`));
    console.log('Uso: spotify-library-export [opciones]\n');
    console.log('Opciones:');
    console.log('  -t, --token <token>         Token de acceso (por defecto: SPOTIFY_TOKEN)');
    console.log(`      --api-url <url>         URL base de la API (por defecto: ${DEFAULT_CONFIG.API_BASE_URL})`);
    console.log(`  -c, --concurrency <num>     Playlists leídas en paralelo (por defecto: ${DEFAULT_CONFIG.CONCURRENCY})`);
    console.log(`  -r, --max-retries <num>     Número máximo de reintentos (por defecto: ${DEFAULT_CONFIG.MAX_RETRIES})`);
    console.log('  -v, --verbose               Mostrar reintentos y tiempos de cada paso');
    console.log('      --json                  Imprimir la instantánea completa como JSON');
    console.log('  -h, --help                  Mostrar este mensaje de ayuda\n');
    console.log('Ejemplos:');
    console.log('  spotify-library-export --token <token>');
    console.log('  SPOTIFY_TOKEN=<token> spotify-library-export --json > biblioteca.json');
    console.log('  spotify-library-export --concurrency 5 --max-retries 3 --verbose\n');
  }
}
