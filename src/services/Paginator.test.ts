import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Paginator } from './Paginator.js';
import {
  ManejadorErrores,
  CONFIGURACION_REINTENTO_PREDETERMINADA,
  ErrorNoAutorizado,
  ErrorProhibido,
  ErrorServidor,
  ErrorRespuestaInvalida,
  ErrorCancelado,
} from '../utils/ErrorHandler.js';
import { SpotifyFollowedArtistsResponseSchema } from '../models/SpotifyTypes.js';
import { FakeTransport, Responder, jsonResponse, recordingSleep, sequence } from '../testing/FakeTransport.js';

const ItemSchema = z.object({ id: z.string() });

function crearPaginador(responder: Responder, signal?: AbortSignal) {
  const transport = new FakeTransport(responder);
  const { delays, dormir } = recordingSleep();
  const manejadorErrores = new ManejadorErrores(
    { ...CONFIGURACION_REINTENTO_PREDETERMINADA, maxReintentos: 2 },
    { dormir }
  );
  const paginator = new Paginator('test-token', { transport, manejadorErrores, signal });
  return { paginator, transport, delays };
}

describe('Paginator.collect', () => {
  it('devuelve una sola página', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(jsonResponse({ items: [{ id: '1' }, { id: '2' }], next: null }))
    );

    const items = await paginator.collect('http://api.test/v1/me/tracks', ItemSchema, 'test');

    expect(items).toEqual([{ id: '1' }, { id: '2' }]);
    expect(transport.requests).toEqual([
      {
        method: 'GET',
        url: 'http://api.test/v1/me/tracks',
        headers: { Authorization: 'Bearer test-token' },
      },
    ]);
  });

  it('concatena las páginas en orden siguiendo next', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(
        jsonResponse({ items: [{ id: '1' }, { id: '2' }], next: 'http://api.test/page2' }),
        jsonResponse({ items: [{ id: '3' }, { id: '4' }], next: null })
      )
    );

    const items = await paginator.collect('http://api.test/page1', ItemSchema, 'test');

    expect(items.map(item => item.id)).toEqual(['1', '2', '3', '4']);
    expect(transport.urls).toEqual(['http://api.test/page1', 'http://api.test/page2']);
  });

  it('sigue de largo una página vacía con next', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(
        jsonResponse({ items: [{ id: '1' }], next: 'http://api.test/page2' }),
        jsonResponse({ items: [], next: 'http://api.test/page3' }),
        jsonResponse({ items: [{ id: '3' }], next: null })
      )
    );

    const items = await paginator.collect('http://api.test/page1', ItemSchema, 'test');

    expect(items.map(item => item.id)).toEqual(['1', '3']);
    expect(transport.requests).toHaveLength(3);
  });

  it('trata items y next ausentes como fin de la colección', async () => {
    const { paginator } = crearPaginador(sequence(jsonResponse({})));

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).resolves.toEqual([]);
  });

  it('lanza ErrorNoAutorizado con un 401 en la segunda página', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(
        jsonResponse({ items: [{ id: '1' }], next: 'http://api.test/page2' }),
        jsonResponse({ error: { status: 401, message: 'The access token expired' } }, 401)
      )
    );

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).rejects.toBeInstanceOf(
      ErrorNoAutorizado
    );
    expect(transport.requests).toHaveLength(2);
  });

  it('lanza ErrorProhibido con un 403 sin reintentar', async () => {
    const { paginator, transport, delays } = crearPaginador(sequence(jsonResponse({}, 403)));

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).rejects.toBeInstanceOf(
      ErrorProhibido
    );
    expect(transport.requests).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('lanza ErrorServidor con el estado al agotar los reintentos', async () => {
    const { paginator, transport, delays } = crearPaginador(sequence(jsonResponse({}, 500)));

    const error = await paginator.collect('http://api.test/page1', ItemSchema, 'test').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ErrorServidor);
    expect(error instanceof ErrorServidor && error.estado).toBe(500);
    expect(transport.requests).toHaveLength(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('recupera la página después de un error transitorio', async () => {
    const { paginator } = crearPaginador(
      sequence(jsonResponse({}, 503), jsonResponse({ items: [{ id: '1' }], next: null }))
    );

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).resolves.toEqual([{ id: '1' }]);
  });

  it('rechaza cuerpos que no son una página', async () => {
    const { paginator } = crearPaginador(sequence(jsonResponse('<html>oops</html>')));

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).rejects.toBeInstanceOf(
      ErrorRespuestaInvalida
    );
  });

  it('rechaza items con forma inesperada', async () => {
    const { paginator } = crearPaginador(sequence(jsonResponse({ items: [{ id: 7 }], next: null })));

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).rejects.toBeInstanceOf(
      ErrorRespuestaInvalida
    );
  });

  it('no emite solicitudes con la señal cancelada', async () => {
    const controller = new AbortController();
    controller.abort();
    const { paginator, transport } = crearPaginador(sequence(jsonResponse({ items: [], next: null })), controller.signal);

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).rejects.toBeInstanceOf(
      ErrorCancelado
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('deja de pedir páginas cuando se cancela a mitad del recorrido', async () => {
    const controller = new AbortController();
    const { paginator, transport } = crearPaginador(() => {
      controller.abort();
      return jsonResponse({ items: [{ id: '1' }], next: 'http://api.test/page2' });
    }, controller.signal);

    await expect(paginator.collect('http://api.test/page1', ItemSchema, 'test')).rejects.toBeInstanceOf(
      ErrorCancelado
    );
    expect(transport.requests).toHaveLength(1);
  });
});

describe('Paginator.collectByCursor', () => {
  const baseUrl = 'http://api.test/v1/me/following?type=artist&limit=50';

  it('agrega after a la URL base y termina cuando falta el cursor', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(
        jsonResponse({ artists: { items: [{ id: 'a' }, { id: 'b' }], cursors: { after: 'X' } } }),
        jsonResponse({ artists: { items: [{ id: 'c' }], cursors: {} } })
      )
    );

    const items = await paginator.collectByCursor(
      baseUrl,
      ItemSchema,
      'test',
      SpotifyFollowedArtistsResponseSchema,
      page => page.artists
    );

    expect(items.map(item => item.id)).toEqual(['a', 'b', 'c']);
    expect(transport.urls).toEqual([baseUrl, `${baseUrl}&after=X`]);
  });

  it('sigue de largo una página vacía con cursor', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(
        jsonResponse({ artists: { items: [], cursors: { after: 'X' } } }),
        jsonResponse({ artists: { items: [{ id: 'c' }], cursors: { after: null } } })
      )
    );

    const items = await paginator.collectByCursor(
      baseUrl,
      ItemSchema,
      'test',
      SpotifyFollowedArtistsResponseSchema,
      page => page.artists
    );

    expect(items).toEqual([{ id: 'c' }]);
    expect(transport.requests).toHaveLength(2);
  });

  it('reemplaza el cursor anterior en lugar de acumularlo', async () => {
    const { paginator, transport } = crearPaginador(
      sequence(
        jsonResponse({ artists: { items: [{ id: 'a' }], cursors: { after: 'X' } } }),
        jsonResponse({ artists: { items: [{ id: 'b' }], cursors: { after: 'Y' } } }),
        jsonResponse({ artists: { items: [{ id: 'c' }] } })
      )
    );

    await paginator.collectByCursor(baseUrl, ItemSchema, 'test', SpotifyFollowedArtistsResponseSchema, page => page.artists);

    expect(transport.urls).toEqual([baseUrl, `${baseUrl}&after=X`, `${baseUrl}&after=Y`]);
  });
});
