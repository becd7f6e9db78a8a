/**
 * Unidad de trabajo con plazo: tarea + deadline + señal de cancelación.
 *
 * Si el plazo vence antes de que la tarea termine, se aborta la señal y el
 * llamador recibe el error de `onTimeout()`. La tarea no se mata: sigue
 * corriendo en segundo plano hasta que observe la señal (o termine sola),
 * así que un timeout no garantiza que la conexión externa se libere.
 */
export type DeadlineTask<T> = (signal: AbortSignal) => Promise<T>;

export async function runWithDeadline<T>(
  task: DeadlineTask<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
