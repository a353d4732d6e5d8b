// src/hotels/hotels.module.ts
import { Module } from '@nestjs/common';
import { HotelSelectorService } from './services/hotel-selector.service';
import { AccommodationAdvisorService } from './services/accommodation-advisor.service';

@Module({
  providers: [HotelSelectorService, AccommodationAdvisorService],
  exports: [HotelSelectorService, AccommodationAdvisorService],
})
export class HotelsModule {}
