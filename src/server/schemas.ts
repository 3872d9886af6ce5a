import { z } from 'zod';

const metadataSchema = z.record(z.unknown());

const textPartSchema = z.object({
  kind: z.literal('text'),
  text: z.string(),
  metadata: metadataSchema.optional(),
});

const dataPartSchema = z.object({
  kind: z.literal('data'),
  data: metadataSchema,
  metadata: metadataSchema.optional(),
});

export const partSchema = z.discriminatedUnion('kind', [textPartSchema, dataPartSchema]);

export const messageSchema = z.object({
  kind: z.literal('message').default('message'),
  messageId: z.string().min(1).optional(),
  role: z.enum(['user', 'agent']),
  parts: z.array(partSchema),
  contextId: z.string().min(1).optional(),
  taskId: z.string().min(1).optional(),
  metadata: metadataSchema.optional(),
});

export const messageSendParamsSchema = z.object({
  message: messageSchema,
  metadata: z
    .object({
      capability: z.string().min(1).optional(),
      parameters: metadataSchema.optional(),
    })
    .passthrough()
    .optional(),
});

export const taskIdParamsSchema = z.object({
  id: z.string().min(1),
});

export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

export type ParsedMessageSendParams = z.infer<typeof messageSendParamsSchema>;

/** Render zod issues as `path: message` pairs. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
