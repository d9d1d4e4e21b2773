import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

import { TierModule } from './modules/tier/tier.module';
import { EntitlementModule } from './modules/entitlement/entitlement.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    ScheduleModule.forRoot(),
    TierModule,
    EntitlementModule,
  ],
})
export class AppModule {}
