#!/usr/bin/env node
import { loadEnv } from './config/env';
import { logger } from './config/logger';
import {
  LibPhoneNumberNormalizer,
  TextMagicAdapter,
  UplistingPmsAdapter,
} from './integrations/adapters';
import { buildRunSettings } from './config/settings';
import { runGuestMessaging } from './services/guest-messaging-run.service';

const start = async (): Promise<void> => {
  try {
    const env = loadEnv();

    const summary = await runGuestMessaging(
      {
        pms: new UplistingPmsAdapter({
          apiKey: env.UPLISTING_API_KEY,
          baseUrl: env.UPLISTING_API_BASE,
        }),
        messaging: new TextMagicAdapter({
          username: env.TEXTMAGIC_USERNAME,
          apiKey: env.TEXTMAGIC_API_KEY,
          baseUrl: env.TEXTMAGIC_API_BASE,
        }),
        normalizer: new LibPhoneNumberNormalizer(),
        settings: buildRunSettings(env),
      },
      new Date(),
    );

    logger.info({ summary }, 'Guest messaging run finished');
  } catch (err) {
    logger.fatal({ err }, 'Guest messaging run aborted');
    process.exitCode = 1;
  }
};

void start();
