import { ErrorCancelado } from './ErrorHandler.js';

/**
 * Procesar `items` con a lo sumo `limite` tareas en vuelo.
 *
 * Cada resultado se guarda en el índice de su item de entrada, así el orden de
 * salida no depende del orden en que terminan las tareas. Si una tarea lanza,
 * no se despachan más y el error se propaga. Con la señal cancelada tampoco se
 * despachan tareas nuevas; las que están en vuelo terminan solas.
 */
export async function mapConcurrently<T, R>(
  items: readonly T[],
  limite: number,
  tarea: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (!Number.isInteger(limite) || limite < 1) {
    throw new RangeError(`El límite de concurrencia debe ser un entero positivo (recibido: ${limite})`);
  }

  const resultados = new Array<R>(items.length);
  let siguiente = 0;
  let fallo = false;

  const trabajador = async (): Promise<void> => {
    while (!fallo && siguiente < items.length) {
      if (signal?.aborted) {
        throw new ErrorCancelado();
      }

      const index = siguiente++;
      try {
        resultados[index] = await tarea(items[index], index);
      } catch (error) {
        fallo = true;
        throw error;
      }
    }
  };

  const trabajadores = Array.from({ length: Math.min(limite, items.length) }, () => trabajador());
  await Promise.all(trabajadores);

  return resultados;
}
