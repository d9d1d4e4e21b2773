import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { TIER_CONFIGURATION } from './domain/tier-configuration';
import { loadTierConfigFile } from './infrastructure/tier-config.loader';

export const DEFAULT_TIER_CONFIG_PATH = 'config/tiers.json';

/**
 * Loads the tier table once at startup. @Global so every module can inject
 * TIER_CONFIGURATION without importing TierModule.
 */
@Global()
@Module({
  providers: [
    {
      provide: TIER_CONFIGURATION,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const path = resolve(
          process.cwd(),
          configService.get<string>('TIER_CONFIG_PATH', DEFAULT_TIER_CONFIG_PATH),
        );
        const configuration = loadTierConfigFile(path);

        new Logger('TierModule').log(
          `Loaded ${configuration.tierIds().length} tiers from ${path}`,
        );
        return configuration;
      },
    },
  ],
  exports: [TIER_CONFIGURATION],
})
export class TierModule {}
