// src/itinerary/dto/budget-preview.dto.ts
import { IsDefined, IsNumber, IsPositive } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { VALIDATION_MESSAGES } from '../services/trip-request-validator.service';

export class BudgetPreviewDto {
  @ApiProperty({ description: 'Total budget in the budget currency', example: 1000 })
  @IsDefined({ message: VALIDATION_MESSAGES.budget })
  @IsNumber({}, { message: VALIDATION_MESSAGES.budget })
  @IsPositive({ message: VALIDATION_MESSAGES.budget })
  totalBudget!: number;
}
