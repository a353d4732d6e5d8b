// src/itinerary/dto/plan-trip.dto.ts
import {
  ArrayNotEmpty,
  IsArray,
  IsDateString,
  IsDefined,
  IsInt,
  IsLatitude,
  IsLongitude,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { VALIDATION_MESSAGES } from '../services/trip-request-validator.service';

/**
 * Trip details DTO
 *
 * Shared by itinerary generation and the hotel shortlist preview. When both
 * `lat` and `lng` are given the destination is not geocoded.
 */
export class PlanTripDto {
  @ApiProperty({ description: 'Destination city', example: 'Edinburgh, UK' })
  @IsDefined({ message: VALIDATION_MESSAGES.destination })
  @IsString({ message: VALIDATION_MESSAGES.destination })
  @IsNotEmpty({ message: VALIDATION_MESSAGES.destination })
  destination!: string;

  @ApiPropertyOptional({ description: 'Destination latitude, skips geocoding together with lng', example: 55.9533 })
  @IsOptional()
  @IsLatitude({ message: VALIDATION_MESSAGES.coordinates })
  lat?: number;

  @ApiPropertyOptional({ description: 'Destination longitude', example: -3.1883 })
  @IsOptional()
  @IsLongitude({ message: VALIDATION_MESSAGES.coordinates })
  lng?: number;

  @ApiProperty({ description: 'First day of the trip', example: '2025-06-01', type: String, format: 'date' })
  @IsDefined({ message: VALIDATION_MESSAGES.dates })
  @IsDateString({}, { message: VALIDATION_MESSAGES.dates })
  startDate!: string;

  @ApiProperty({ description: 'Last day of the trip', example: '2025-06-06', type: String, format: 'date' })
  @IsDefined({ message: VALIDATION_MESSAGES.dates })
  @IsDateString({}, { message: VALIDATION_MESSAGES.dates })
  endDate!: string;

  @ApiProperty({ description: 'Number of adults', example: 2, minimum: 1 })
  @IsDefined({ message: VALIDATION_MESSAGES.adults })
  @IsInt({ message: VALIDATION_MESSAGES.adults })
  @Min(1, { message: VALIDATION_MESSAGES.adults })
  adults!: number;

  @ApiPropertyOptional({ description: 'Number of children', example: 0, minimum: 0, default: 0 })
  @IsOptional()
  @IsInt({ message: VALIDATION_MESSAGES.children })
  @Min(0, { message: VALIDATION_MESSAGES.children })
  children?: number;

  @ApiProperty({ description: 'Total budget in the budget currency', example: 1000 })
  @IsDefined({ message: VALIDATION_MESSAGES.budget })
  @IsNumber({}, { message: VALIDATION_MESSAGES.budget })
  @IsPositive({ message: VALIDATION_MESSAGES.budget })
  totalBudget!: number;

  @ApiProperty({ description: 'Interests', example: ['History', 'Food'], type: [String] })
  @IsDefined({ message: VALIDATION_MESSAGES.interests })
  @IsArray({ message: VALIDATION_MESSAGES.interests })
  @ArrayNotEmpty({ message: VALIDATION_MESSAGES.interests })
  @IsString({ each: true })
  interests!: string[];

  @ApiPropertyOptional({
    description: 'Preferred accommodation types (Hotel, Hostel, Apartment, Guesthouse, Resort)',
    example: ['Hotel', 'Guesthouse'],
    type: [String],
  })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  accommodationTypes?: string[];

  @ApiPropertyOptional({ description: 'Minimum accommodation rating', example: 3.5, minimum: 1, maximum: 5, default: 3 })
  @IsOptional()
  @IsNumber({}, { message: VALIDATION_MESSAGES.rating })
  @Min(1, { message: VALIDATION_MESSAGES.rating })
  @Max(5, { message: VALIDATION_MESSAGES.rating })
  minAccommodationRating?: number;
}
