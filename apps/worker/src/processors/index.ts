import type { MessageJobData } from '@taskrelay/queue';
import type { createInboundProcessor } from './inbound.js';
import type { createOutboundProcessor } from './outbound.js';

export { createInboundProcessor, type InboundProcessorDeps } from './inbound.js';
export { createOutboundProcessor, type OutboundProcessorDeps } from './outbound.js';

export interface Processors {
  inbound: ReturnType<typeof createInboundProcessor>;
  outbound: ReturnType<typeof createOutboundProcessor>;
}

/**
 * Dispatch a job to its processor by type
 */
export async function processMessageJob(processors: Processors, data: MessageJobData): Promise<unknown> {
  switch (data.type) {
    case 'inbound':
      return processors.inbound(data);
    case 'outbound':
      return processors.outbound(data);
  }
}
