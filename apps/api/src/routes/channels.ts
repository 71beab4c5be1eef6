import { Router } from 'express';

import type { ChannelRegistry } from '../channels/channel-registry';
import { asyncHandler } from '../middleware/error-handler';

export const createChannelsRouter = (registry: ChannelRegistry): Router => {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const channels = await registry.describe();
      res.json({
        success: true,
        data: {
          defaultChannelType: registry.defaultType,
          items: channels,
        },
      });
    })
  );

  return router;
};
