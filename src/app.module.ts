// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PlanningModule } from './planning/planning.module';
import { ProvidersModule } from './providers/providers.module';
import { HotelsModule } from './hotels/hotels.module';
import { LlmModule } from './llm/llm.module';
import { ItineraryModule } from './itinerary/itinerary.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    PlanningModule, // budget shares, price tiers, currency
    ProvidersModule, // geocoding / places / weather lookups
    HotelsModule,
    LlmModule,
    ItineraryModule,
  ],
})
export class AppModule {}
