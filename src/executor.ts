import { Transport, describeFailure } from './http-client.js';
import { RequestOutcome, RequestSpec } from './types.js';

const SUCCESS_STATUS = 200;

/**
 * Issues one request and reports what happened as data.
 *
 * Latency is measured up to the response headers. The body is always read;
 * it is kept only for non-200 responses. Never rejects.
 */
export async function executeRequest(
  transport: Transport,
  request: RequestSpec,
  now: () => number = () => performance.now()
): Promise<RequestOutcome> {
  const start = now();
  try {
    const response = await transport.send(request);
    const latency = (now() - start) / 1000;
    // Drain the body even on success, or the connection never returns to the pool
    const body = await response.text();

    if (response.status === SUCCESS_STATUS) {
      return { kind: 'success', latency, status: response.status };
    }

    return { kind: 'error-status', latency, status: response.status, body };
  } catch (error) {
    return { kind: 'exception', message: describeFailure(error) };
  }
}
