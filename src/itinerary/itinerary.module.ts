// src/itinerary/itinerary.module.ts
import { Module } from '@nestjs/common';
import { ItineraryController } from './itinerary.controller';
import { ItineraryPlannerService } from './services/itinerary-planner.service';
import { ItineraryPromptBuilderService } from './services/itinerary-prompt-builder.service';
import { TripRequestValidator } from './services/trip-request-validator.service';
import { HotelsModule } from '../hotels/hotels.module';
import { ProvidersModule } from '../providers/providers.module';
import { LlmModule } from '../llm/llm.module';

@Module({
  imports: [HotelsModule, ProvidersModule, LlmModule],
  controllers: [ItineraryController],
  providers: [ItineraryPlannerService, ItineraryPromptBuilderService, TripRequestValidator],
  exports: [ItineraryPlannerService, ItineraryPromptBuilderService],
})
export class ItineraryModule {}
