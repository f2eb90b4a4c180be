import { describe, it, expect } from 'vitest';
import { ConfigManager } from './ConfigManager.js';
import { CONFIGURACION_REINTENTO_PREDETERMINADA } from '../utils/ErrorHandler.js';

describe('ConfigManager', () => {
  it('usa los valores por defecto con un entorno vacío', () => {
    const config = new ConfigManager({}).load();

    expect(config).toEqual({
      apiBaseUrl: 'https://api.spotify.com',
      token: undefined,
      concurrency: 10,
      retry: CONFIGURACION_REINTENTO_PREDETERMINADA,
      logLevel: 'error',
    });
  });

  it('lee los valores del entorno', () => {
    const config = new ConfigManager({
      SPOTIFY_API_URL: 'http://localhost:9999',
      SPOTIFY_TOKEN: ' test-token ',
      EXPORT_CONCURRENCY: '4',
      EXPORT_MAX_RETRIES: '2',
      EXPORT_RETRY_NETWORK_ERRORS: 'true',
      LOG_LEVEL: 'debug',
    }).load();

    expect(config.apiBaseUrl).toBe('http://localhost:9999');
    expect(config.token).toBe('test-token');
    expect(config.concurrency).toBe(4);
    expect(config.retry.maxReintentos).toBe(2);
    expect(config.retry.reintentarErroresRed).toBe(true);
    expect(config.retry.retrasoBase).toBe(1000);
    expect(config.logLevel).toBe('debug');
  });

  it('trata las variables vacías como ausentes', () => {
    const config = new ConfigManager({ SPOTIFY_TOKEN: '', EXPORT_CONCURRENCY: '', EXPORT_RETRY_NETWORK_ERRORS: '' }).load();

    expect(config.token).toBeUndefined();
    expect(config.concurrency).toBe(10);
    expect(config.retry.reintentarErroresRed).toBe(false);
  });

  it('informa el token faltante sin invalidar la configuración', () => {
    expect(new ConfigManager({}).validate()).toEqual({
      isValid: true,
      missingFields: ['SPOTIFY_TOKEN'],
      errors: [],
    });
  });

  it('rechaza valores fuera de rango', () => {
    const manager = new ConfigManager({ EXPORT_CONCURRENCY: '0', LOG_LEVEL: 'loud' });
    const validation = manager.validate();

    expect(validation.isValid).toBe(false);
    expect(validation.errors).toHaveLength(2);
    expect(validation.errors[0]).toMatch(/^EXPORT_CONCURRENCY: /);
    expect(validation.errors[1]).toMatch(/^LOG_LEVEL: /);
    expect(() => manager.load()).toThrow(/^Configuración inválida: /);
  });

  it('rechaza una URL de API inválida', () => {
    const validation = new ConfigManager({ SPOTIFY_API_URL: 'not a url' }).validate();

    expect(validation.isValid).toBe(false);
    expect(validation.errors).toEqual(['SPOTIFY_API_URL: SPOTIFY_API_URL debe ser una URL válida']);
  });

  it('aplica los valores prioritarios sin pisar con indefinidos', () => {
    const config = new ConfigManager({ SPOTIFY_TOKEN: 'env-token', EXPORT_CONCURRENCY: '4' })
      .withOverrides({ SPOTIFY_TOKEN: undefined, EXPORT_CONCURRENCY: '8', EXPORT_MAX_RETRIES: '0' })
      .load();

    expect(config.token).toBe('env-token');
    expect(config.concurrency).toBe(8);
    expect(config.retry.maxReintentos).toBe(0);
  });

  it('valida los valores prioritarios con el mismo esquema', () => {
    const validation = new ConfigManager({}).withOverrides({ EXPORT_CONCURRENCY: '51' }).validate();

    expect(validation.isValid).toBe(false);
    expect(validation.errors).toHaveLength(1);
    expect(validation.errors[0]).toMatch(/^EXPORT_CONCURRENCY: /);
  });
});
