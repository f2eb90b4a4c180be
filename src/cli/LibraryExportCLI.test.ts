import { describe, it, expect, vi, afterEach } from 'vitest';
import { CLIOptions, LibraryExportCLI } from './LibraryExportCLI.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { HELP_MESSAGES } from '../config/defaults.js';

describe('LibraryExportCLI.parseArguments', () => {
  it('lee todas las opciones', () => {
    expect(
      LibraryExportCLI.parseArguments([
        '--token', 'test-token',
        '--api-url', 'http://localhost:9999',
        '-c', '4',
        '-r', '0',
        '-v',
        '--json',
      ])
    ).toEqual({
      token: 'test-token',
      apiUrl: 'http://localhost:9999',
      concurrency: 4,
      maxRetries: 0,
      verbose: true,
      json: true,
    });
  });

  it('ignora valores no numéricos y deja los rangos a la validación', () => {
    expect(LibraryExportCLI.parseArguments(['--concurrency', 'many', '--max-retries', '-1'])).toEqual({
      maxRetries: -1,
    });
  });

  it('reconoce --help', () => {
    expect(LibraryExportCLI.parseArguments(['-h'])).toEqual({ help: true });
  });
});

describe('LibraryExportCLI.main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('muestra la ayuda y termina con 0', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(new LibraryExportCLI({ help: true }, new ConfigManager({})).main()).resolves.toBe(0);
    expect(log).toHaveBeenCalled();
  });

  it('termina con 1 sin token', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(new LibraryExportCLI({}, new ConfigManager({})).main()).resolves.toBe(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0][0]).toContain(HELP_MESSAGES.TOKEN_MISSING.trim().split('\n')[0]);
    expect(error.mock.calls[1][0]).toContain('Variables faltantes: SPOTIFY_TOKEN');
  });

  it('termina con 1 con configuración inválida', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      new LibraryExportCLI({ token: 'test-token' }, new ConfigManager({ EXPORT_CONCURRENCY: '500' })).main()
    ).resolves.toBe(1);
    expect(error.mock.calls[1][0]).toContain('EXPORT_CONCURRENCY: ');
  });

  it.each<[CLIOptions, string]>([
    [{ concurrency: 500 }, 'EXPORT_CONCURRENCY: '],
    [{ concurrency: 0 }, 'EXPORT_CONCURRENCY: '],
    [{ maxRetries: 11 }, 'EXPORT_MAX_RETRIES: '],
    [{ maxRetries: -1 }, 'EXPORT_MAX_RETRIES: '],
    [{ apiUrl: 'not a url' }, 'SPOTIFY_API_URL: SPOTIFY_API_URL debe ser una URL válida'],
  ])('valida los flags %o con las reglas del entorno', async (flags, esperado) => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(
      new LibraryExportCLI({ token: 'test-token', ...flags }, new ConfigManager({})).main()
    ).resolves.toBe(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[1][0]).toContain(esperado);
  });
});
