import type { IncomingMessage, ServerResponse } from 'node:http';
import { PayloadTooLargeError, ServiceError, errorReason } from './errors';
import type { App } from './index';
import type { Logger } from './logger';
import type { ErrorResponse } from './types';

export interface NodeHandlerOptions {
  maxBodyBytes: number;
}

const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const toHeaders = (req: IncomingMessage): Headers => {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) headers.append(key, item);
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return headers;
};

/**
 * Collects the body up to `maxBytes`. Past the cap the rest is drained and
 * discarded so the 413 can still be written on the same connection.
 */
const readBody = (req: IncomingMessage, maxBytes: number): Promise<Buffer> => {
  return new Promise<Buffer>((resolve, reject) => {
    const declared = Number.parseInt(req.headers['content-length'] || '', 10);
    if (Number.isFinite(declared) && declared > maxBytes) {
      req.resume();
      reject(new PayloadTooLargeError(maxBytes));
      return;
    }

    const chunks: Buffer[] = [];
    let received = 0;
    let overflowed = false;

    req.on('data', (chunk: Buffer) => {
      if (overflowed) return;
      received += chunk.length;
      if (received > maxBytes) {
        overflowed = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!overflowed) resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
    req.on('close', () => {
      if (!req.complete) reject(new Error('Client closed the connection before the body was received.'));
    });
  });
};

export const nodeToWebRequest = async (
  req: IncomingMessage,
  signal: AbortSignal,
  maxBodyBytes = DEFAULT_MAX_BODY_BYTES
): Promise<Request> => {
  const host = req.headers.host || 'localhost';
  const url = `http://${host}${req.url || '/'}`;
  const method = req.method || 'GET';

  const body = await readBody(req, maxBodyBytes);
  const hasBody = body.length > 0 && method !== 'GET' && method !== 'HEAD';

  return new Request(url, {
    method,
    headers: toHeaders(req),
    body: hasBody ? body.toString('utf8') : undefined,
    signal
  });
};

/** Resolves true on `drain`, false when the connection closes first. */
const waitForDrain = (res: ServerResponse): Promise<boolean> => {
  return new Promise<boolean>((resolve) => {
    const onDrain = () => {
      res.off('close', onClose);
      resolve(true);
    };
    const onClose = () => {
      res.off('drain', onDrain);
      resolve(false);
    };
    res.once('drain', onDrain);
    res.once('close', onClose);
  });
};

/**
 * Streams the web Response to the socket chunk by chunk. The body is read
 * again only after the socket has drained, and a client that goes away
 * cancels it.
 */
export const writeWebResponse = async (webRes: Response, res: ServerResponse, logger: Logger): Promise<void> => {
  const cancelBody = (body: ReadableStream<Uint8Array> | ReadableStreamDefaultReader<Uint8Array>) => {
    body.cancel().catch((error: unknown) => {
      logger.debug('response.cancel_failed', { reason: errorReason(error) });
    });
  };

  if (res.destroyed) {
    if (webRes.body) cancelBody(webRes.body);
    return;
  }

  const headers: Record<string, string> = {};
  webRes.headers.forEach((value, key) => {
    headers[key] = value;
  });
  res.writeHead(webRes.status, headers);

  if (!webRes.body) {
    res.end();
    return;
  }

  const reader = webRes.body.getReader();
  const onClose = () => {
    if (!res.writableFinished) cancelBody(reader);
  };
  res.on('close', onClose);

  try {
    while (!res.destroyed) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!res.write(value) && !(await waitForDrain(res))) return;
    }
    if (!res.destroyed) res.end();
  } finally {
    res.off('close', onClose);
  }
};

const writeAdapterError = (res: ServerResponse, status: number, type: string, message: string): void => {
  const body: ErrorResponse = {
    error: { message, type, status_code: status, request_id: crypto.randomUUID() }
  };
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'X-Request-Id': body.error.request_id
  });
  res.end(JSON.stringify(body));
};

export const createNodeHandler = (
  app: App,
  logger: Logger,
  options: NodeHandlerOptions = { maxBodyBytes: DEFAULT_MAX_BODY_BYTES }
) => {
  return (req: IncomingMessage, res: ServerResponse): void => {
    const abort = new AbortController();
    // Covers the whole turn, including buffered handlers that have not written yet.
    res.on('close', () => {
      if (!res.writableFinished) abort.abort();
    });

    nodeToWebRequest(req, abort.signal, options.maxBodyBytes)
      .then((request) => app.fetch(request))
      .then((response) => writeWebResponse(response, res, logger))
      .catch((error: unknown) => {
        if (res.destroyed) {
          logger.debug('server.client_gone', { reason: errorReason(error) });
          return;
        }

        if (res.headersSent) {
          logger.error('server.response_failed', { reason: errorReason(error) });
          res.destroy();
          return;
        }

        if (error instanceof ServiceError) {
          logger.warn('server.request_rejected', { type: error.type, status: error.status, reason: error.message });
          writeAdapterError(res, error.status, error.type, error.message);
          return;
        }

        logger.error('server.response_failed', { reason: errorReason(error) });
        writeAdapterError(res, 500, 'internal_error', 'Internal server error.');
      });
  };
};
