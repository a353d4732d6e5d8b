// src/itinerary/dto/refine-itinerary.dto.ts
import { IsArray, IsDefined, IsIn, IsNotEmpty, IsString, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty } from '@nestjs/swagger';
import { ConversationRole } from '../interfaces/conversation.interface';
import { VALIDATION_MESSAGES } from '../services/trip-request-validator.service';

export class ConversationTurnDto {
  @ApiProperty({ enum: ['user', 'assistant'], example: 'assistant' })
  @IsDefined()
  @IsIn(['user', 'assistant'])
  role!: ConversationRole;

  @ApiProperty({ example: 'Day 1: Edinburgh Castle ...' })
  @IsDefined()
  @IsString()
  content!: string;
}

/**
 * Refinement request
 *
 * The client keeps the conversation and sends it back with every request;
 * the response carries the extended history.
 */
export class RefineItineraryDto {
  @ApiProperty({ description: 'Conversation so far, oldest first', type: [ConversationTurnDto] })
  @IsDefined()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ConversationTurnDto)
  history!: ConversationTurnDto[];

  @ApiProperty({ description: 'What to change', example: 'Make day 2 more relaxed' })
  @IsDefined({ message: VALIDATION_MESSAGES.refinement })
  @IsString({ message: VALIDATION_MESSAGES.refinement })
  @IsNotEmpty({ message: VALIDATION_MESSAGES.refinement })
  input!: string;
}
