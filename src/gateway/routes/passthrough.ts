import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';

// Connection-scoped headers (RFC 9110 section 7.6.1) plus the ones fetch recomputes
const SKIPPED_REQUEST_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

// fetch has already decoded the body, so its encoding and length no longer apply
const SKIPPED_RESPONSE_HEADERS = new Set([
  'connection',
  'keep-alive',
  'transfer-encoding',
  'content-encoding',
  'content-length',
  'set-cookie',
]);

function copyRequestHeaders(request: FastifyRequest): Headers {
  const headers = new Headers();

  for (const [name, value] of Object.entries(request.headers)) {
    if (value === undefined || SKIPPED_REQUEST_HEADERS.has(name)) continue;

    if (Array.isArray(value)) {
      for (const item of value) headers.append(name, item);
    } else {
      headers.set(name, value);
    }
  }

  return headers;
}

const passthroughRoute: FastifyPluginAsync = async (fastify) => {
  const { config, gatewayLogger: logger } = fastify;
  const upstreamUrl = config.gateway.upstream_url.replace(/\/+$/, '');

  // Forward the exact bytes received, whatever the content type
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, payload, done) => {
    done(null, payload);
  });

  const forwardToUpstream = async (request: FastifyRequest, reply: FastifyReply) => {
    const targetUrl = `${upstreamUrl}${request.url}`;

    logger.debug({ method: request.method, url: request.url }, 'Forwarding to upstream');

    try {
      const fetchOptions: RequestInit = {
        method: request.method,
        headers: copyRequestHeaders(request),
        signal: AbortSignal.timeout(config.gateway.timeout_ms),
        redirect: 'manual',
      };

      const body = request.body;
      if (!['GET', 'HEAD'].includes(request.method) && Buffer.isBuffer(body) && body.length > 0) {
        fetchOptions.body = body;
      }

      const response = await fetch(targetUrl, fetchOptions);
      const responseBody = await response.arrayBuffer();

      if (response.status >= 500) {
        logger.warn({ status: response.status, url: request.url }, 'Upstream returned error');
      }

      reply.code(response.status);

      response.headers.forEach((value, name) => {
        if (!SKIPPED_RESPONSE_HEADERS.has(name)) {
          reply.header(name, value);
        }
      });

      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) {
        reply.header('set-cookie', cookies);
      }

      return reply.send(Buffer.from(responseBody));
    } catch (err) {
      logger.error({ err, url: request.url }, 'Failed to forward request');
      return reply.code(502).send({ error: 'Failed to forward to upstream' });
    }
  };

  fastify.all('/*', forwardToUpstream);
};

export default passthroughRoute;
