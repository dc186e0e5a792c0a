import { Duplex } from 'stream';

/**
 * Pipe bytes both ways until either side ends, errors or closes; then both are
 * torn down. Resolves once both sockets have closed.
 */
export function relay(local: Duplex, remote: Duplex, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    let tornDown = false;

    const teardown = () => {
      if (tornDown) return;
      tornDown = true;
      local.unpipe(remote);
      remote.unpipe(local);
      local.destroy();
      remote.destroy();
    };

    let open = [local, remote].filter(stream => !stream.destroyed).length;
    const onClosed = () => {
      open -= 1;
      if (open === 0) {
        signal?.removeEventListener('abort', teardown);
        resolve();
      }
    };
    if (open === 0) {
      resolve();
      return;
    }

    for (const stream of [local, remote]) {
      stream.once('end', teardown);
      if (!stream.destroyed) {
        stream.once('close', () => {
          teardown();
          onClosed();
        });
      }
      stream.on('error', error => {
        console.error(`[forward] relay error: ${error.message}`);
        teardown();
      });
    }

    if (signal?.aborted || local.destroyed || remote.destroyed) {
      teardown();
      return;
    }
    signal?.addEventListener('abort', teardown, { once: true });

    local.pipe(remote, { end: false });
    remote.pipe(local, { end: false });
    local.resume();
    remote.resume();
  });
}
