import type { FastifyInstance } from 'fastify';
import { BoundedBytes } from '../bytes/bounded-bytes.js';
import { signMessage, verifyMessage } from '../core/hmac.js';
import { decodeInput, type InputEncoding, type TagEncoding } from '../utils/encoding.js';

export type SigningRoutesOptions = {
  secret: string;
  maxMessageBytes: number;
};

interface SignBody {
  message: string;
  encoding?: InputEncoding;
  output?: TagEncoding;
}

interface VerifyBody extends SignBody {
  signature: string;
}

const messageProperties = {
  message: { type: 'string' },
  encoding: { type: 'string', enum: ['utf8', 'hex', 'base64'] },
  output: { type: 'string', enum: ['hex', 'base64'] },
} as const;

export async function signingRoutes(app: FastifyInstance, opts: SigningRoutesOptions) {
  const key = BoundedBytes.fromString(opts.secret);

  // throws CapacityError past the configured limit; the error handler turns that into 413
  function readMessage(body: SignBody): BoundedBytes {
    return BoundedBytes.from(decodeInput(body.message, body.encoding ?? 'utf8'), opts.maxMessageBytes);
  }

  app.post<{ Body: SignBody }>(
    '/hmac/sign',
    {
      schema: {
        body: {
          type: 'object',
          required: ['message'],
          properties: messageProperties,
        },
      },
    },
    async (req) => {
      const output = req.body.output ?? 'hex';
      const message = readMessage(req.body);
      req.log.debug({ length: message.length }, 'signing message');
      return { algorithm: 'hmac-sha256', signature: signMessage(key, message, output), output };
    },
  );

  app.post<{ Body: VerifyBody }>(
    '/hmac/verify',
    {
      schema: {
        body: {
          type: 'object',
          required: ['message', 'signature'],
          properties: { ...messageProperties, signature: { type: 'string' } },
        },
      },
    },
    async (req) => {
      const message = readMessage(req.body);
      const valid = verifyMessage(key, message, req.body.signature, req.body.output ?? 'hex');
      if (!valid) {
        req.log.info({ length: message.length }, 'signature mismatch');
      }
      return { valid };
    },
  );
}
