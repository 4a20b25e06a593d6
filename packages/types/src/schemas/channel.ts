import { z } from 'zod';

/**
 * Pub/sub channels shared by the monitoring agents
 */
export const CHANNELS = {
  monitoring: 'monitoring_events',
  performance: 'performance_events',
  semantic: 'semantic_events',
  approval: 'approval_events',
} as const;

export type ChannelKey = keyof typeof CHANNELS;

export const ChannelNameSchema = z.enum([
  CHANNELS.monitoring,
  CHANNELS.performance,
  CHANNELS.semantic,
  CHANNELS.approval,
]);

export type ChannelName = z.infer<typeof ChannelNameSchema>;
