// src/itinerary/itinerary.controller.ts
import { BadRequestException, Body, Controller, HttpCode, HttpStatus, Logger, NotFoundException, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ItineraryPlannerService } from './services/itinerary-planner.service';
import { TripValidationError } from './services/trip-request-validator.service';
import { PlanTripDto } from './dto/plan-trip.dto';
import { RefineItineraryDto } from './dto/refine-itinerary.dto';
import { BudgetPreviewDto } from './dto/budget-preview.dto';
import { toPlanningInput } from './utils/trip-input.mapper';
import { LodgingPreview, RefinementResult, TripPlan } from './interfaces/trip.interface';
import { BudgetBreakdown } from '../budget/interfaces/budget.interface';
import { ErrorCode, StandardResponse, errorResponse, successResponse } from '../common/dto/standard-response.dto';
import { ApiErrorResponseDto, ApiSuccessResponseDto } from '../common/dto/api-response.dto';
import { extractErrorMessage, extractErrorStack } from '../common/utils/error-message.util';

@ApiTags('itinerary')
@Controller('itinerary')
export class ItineraryController {
  private readonly logger = new Logger(ItineraryController.name);

  constructor(private readonly plannerService: ItineraryPlannerService) {}

  @Post('plan')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Generate an itinerary',
    description:
      'Allocates the budget, shortlists affordable hotels, builds the prompt and generates a day-by-day itinerary. ' +
      'The response history seeds later refinement requests.',
  })
  @ApiBody({ type: PlanTripDto })
  @ApiResponse({ status: 200, description: 'Itinerary, prompt record, shortlist and history', type: ApiSuccessResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid trip input', type: ApiErrorResponseDto })
  async plan(@Body() dto: PlanTripDto): Promise<StandardResponse<TripPlan>> {
    try {
      return successResponse(await this.plannerService.plan(toPlanningInput(dto)));
    } catch (error) {
      return this.toErrorResponse('Failed to plan trip', error);
    }
  }

  @Post('refine')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Refine an itinerary',
    description: 'Sends the conversation so far and a change request; returns the reply and the extended history.',
  })
  @ApiBody({ type: RefineItineraryDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  async refine(@Body() dto: RefineItineraryDto): Promise<StandardResponse<RefinementResult>> {
    try {
      return successResponse(await this.plannerService.refine(dto.history, dto.input));
    } catch (error) {
      return this.toErrorResponse('Failed to refine itinerary', error);
    }
  }

  @Post('budget')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Preview the budget allocation' })
  @ApiBody({ type: BudgetPreviewDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  previewBudget(@Body() dto: BudgetPreviewDto): StandardResponse<BudgetBreakdown> {
    return successResponse(this.plannerService.previewBudget(dto.totalBudget));
  }

  @Post('hotels')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Preview the hotel shortlist',
    description: 'Returns the ranked affordable hotels and the recommended accommodation category for a trip.',
  })
  @ApiBody({ type: PlanTripDto })
  @ApiResponse({ status: 200, type: ApiSuccessResponseDto })
  async previewHotels(@Body() dto: PlanTripDto): Promise<StandardResponse<LodgingPreview>> {
    try {
      return successResponse(await this.plannerService.previewLodging(toPlanningInput(dto)));
    } catch (error) {
      return this.toErrorResponse('Failed to shortlist hotels', error);
    }
  }

  private toErrorResponse(context: string, error: unknown): StandardResponse<never> {
    if (error instanceof TripValidationError) {
      return errorResponse(ErrorCode.VALIDATION_ERROR, error.message, { errors: error.errors });
    }
    if (error instanceof BadRequestException) {
      return errorResponse(ErrorCode.VALIDATION_ERROR, error.message);
    }
    if (error instanceof NotFoundException) {
      return errorResponse(ErrorCode.NOT_FOUND, error.message);
    }

    const message = extractErrorMessage(error);
    this.logger.error(`${context}: ${message}`, extractErrorStack(error));
    return errorResponse(ErrorCode.INTERNAL_ERROR, message);
  }
}
