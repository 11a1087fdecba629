import type { FastifyInstance } from "fastify";

export interface QueueEvent {
  type: string;
  at: number;
  queue: string;
  entryId?: string;
  detail?: Record<string, unknown>;
}

export interface QueuePluginContext {
  emit(event: QueueEvent): void;
}

export interface QueuePlugin {
  name: string;
  register(app: FastifyInstance, ctx: QueuePluginContext): Promise<void> | void;
}

export const noopContext: QueuePluginContext = { emit() {} };
