/**
 * Command specifications accepted by the gateway.
 * Each logical operation carries its own typed parameters.
 */

import { z } from 'zod';
import { CLOUD_PROVIDERS } from '../domain/types';

const imageRefSchema = z.object({
  registry: z.string().min(1),
  name: z.string().min(1),
  tag: z.string().min(1),
});

const timeoutSchema = z.number().int().positive().optional().describe('Call deadline in milliseconds');

export const commandSpecSchema = z.discriminatedUnion('operation', [
  z.object({
    operation: z.literal('checkTool'),
    command: z.string().min(1),
    args: z.array(z.string()).default(['--version']),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('pingEngine'),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('pingCluster'),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('buildImage'),
    image: imageRefSchema,
    dockerfile: z.string().min(1),
    context: z.string().min(1),
    buildArgs: z.record(z.string()).optional(),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('pushImage'),
    image: imageRefSchema,
    credentials: z.object({ username: z.string(), password: z.string() }).optional(),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('composeDown'),
    command: z.array(z.string().min(1)).min(1),
    file: z.string().min(1),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('composeUp'),
    command: z.array(z.string().min(1)).min(1),
    file: z.string().min(1),
    build: z.boolean().default(true),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('ensureNamespace'),
    namespace: z.string().min(1),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('createSecret'),
    namespace: z.string().min(1),
    name: z.string().min(1),
    data: z.record(z.string()),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('applyManifests'),
    namespace: z.string().min(1),
    path: z.string().min(1),
    timeoutMs: timeoutSchema,
  }),
  z.object({
    operation: z.literal('waitForCondition'),
    namespace: z.string().min(1),
    selector: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    pollIntervalMs: z.number().int().positive(),
  }),
  z.object({
    operation: z.literal('queryServiceEndpoint'),
    namespace: z.string().min(1),
    service: z.string().min(1),
    provider: z.enum(CLOUD_PROVIDERS),
    timeoutMs: timeoutSchema,
  }),
]);

/** Parameters as callers write them (defaults optional) */
export type CommandSpec = z.input<typeof commandSpecSchema>;

/** Parameters after validation and defaults */
export type ParsedCommandSpec = z.output<typeof commandSpecSchema>;

export type CommandOperation = ParsedCommandSpec['operation'];

export type CommandSpecOf<O extends CommandOperation> = Extract<ParsedCommandSpec, { operation: O }>;
