// src/planning/planning.module.ts
import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PLANNER_SETTINGS, loadPlannerSettings } from './config/planner-settings.config';

/**
 * Planning policy module
 *
 * Exposes the budget share policy, the price tier table and the currency
 * symbol to every module as one settings object.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: PLANNER_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => loadPlannerSettings(configService),
    },
  ],
  exports: [PLANNER_SETTINGS],
})
export class PlanningModule {}
