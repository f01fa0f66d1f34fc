import type { WaterRequest } from '../worker/protocol';

/** The coordinator's only view of the execution context. */
export interface WorkerLink {
  send(request: WaterRequest, transfer?: Transferable[]): void;
  onMessage(listener: (data: unknown) => void): void;
  onError(listener: (message: string) => void): void;
  terminate(): void;
}

export type WorkerFactory = () => WorkerLink;

export function spawnWaterWorker(): WorkerLink {
  if (typeof Worker === 'undefined') {
    throw new Error('Web Workers are not available in this environment');
  }

  const worker = new Worker(new URL('../worker/water.worker.ts', import.meta.url), {
    type: 'module'
  });

  return {
    send: (request, transfer = []) => {
      worker.postMessage(request, transfer);
    },
    onMessage: (listener) => {
      worker.addEventListener('message', (event: MessageEvent<unknown>) => {
        listener(event.data);
      });
    },
    onError: (listener) => {
      worker.addEventListener('error', (event) => {
        listener(event.message);
      });
    },
    terminate: () => {
      worker.terminate();
    }
  };
}
