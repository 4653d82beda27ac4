import { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { AppError } from '../errors';
import type { IntakeService } from '../services/pipeline/intake';

export interface CertificateRoutesOptions {
  intake: IntakeService;
}

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'Must be an http(s) URL' });

function isPdfUrl(value: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(value).pathname;
  } catch {
    return false;
  }
  const match = /\.([a-z0-9]{1,5})$/i.exec(pathname);
  return !match || match[1]?.toLowerCase() === 'pdf';
}

const submitCertificateSchema = z.object({
  documentId: z.string().trim().min(1).max(200),
  fileUrl: httpUrl.refine(isPdfUrl, { message: 'Only PDF files are accepted' }),
  variant: z.string().trim().min(1),
  identityData: z.record(z.string()),
  responseUrl: httpUrl.optional(),
  origin: z.string().optional(),
  destination: z.string().optional(),
});

const documentParamsSchema = z.object({
  documentId: z.string().trim().min(1),
});

function sendError(fastify: FastifyInstance, reply: FastifyReply, error: unknown) {
  if (error instanceof z.ZodError) {
    return reply.code(400).send({ error: 'Invalid request body', details: error.errors });
  }
  if (error instanceof AppError && error.statusCode < 500) {
    return reply.code(error.statusCode).send({ error: error.message, code: error.code });
  }
  fastify.log.error(error);
  return reply.code(500).send({ error: 'Internal server error' });
}

export async function certificateRoutes(fastify: FastifyInstance, options: CertificateRoutesOptions) {
  const { intake } = options;

  fastify.post('/api/v1/certificates/f30', async (request, reply) => {
    try {
      const body = submitCertificateSchema.parse(request.body);
      const receipt = await intake.submit(body);
      return reply.code(202).send(receipt);
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });

  fastify.get('/api/v1/certificates/:documentId', async (request, reply) => {
    try {
      const { documentId } = documentParamsSchema.parse(request.params);
      const run = await intake.latestRun(documentId);
      if (!run) {
        return reply.code(404).send({ error: 'Document not found' });
      }
      return reply.send({
        documentId: run.job.documentId,
        runId: run.job.runId,
        variant: run.job.variant,
        state: run.job.state,
        createdAt: run.job.createdAt,
        decision: run.decision,
      });
    } catch (error) {
      return sendError(fastify, reply, error);
    }
  });
}
