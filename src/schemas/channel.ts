/**
 * Channel Schema - a creator to follow, with its priority
 */

import { z } from 'zod';

/**
 * One row of the channel list.
 * Higher priority channels are processed first.
 */
export const ChannelEntrySchema = z.object({
  name: z.string().min(1, 'Channel name must not be empty'),
  channelId: z.string().min(1, 'Channel id must not be empty'),
  priority: z.number().int('Priority must be an integer'),
});

export type ChannelEntry = z.infer<typeof ChannelEntrySchema>;
