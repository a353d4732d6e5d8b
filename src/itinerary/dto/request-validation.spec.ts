// src/itinerary/dto/request-validation.spec.ts

import { ArgumentMetadata, BadRequestException } from '@nestjs/common';
import { createValidationPipe } from '../../common/utils/validation-pipe.factory';
import { PlanTripDto } from './plan-trip.dto';
import { BudgetPreviewDto } from './budget-preview.dto';
import { RefineItineraryDto } from './refine-itinerary.dto';
import { VALIDATION_MESSAGES } from '../services/trip-request-validator.service';

describe('request DTO validation', () => {
  const pipe = createValidationPipe();

  const bodyOf = (metatype: ArgumentMetadata['metatype']): ArgumentMetadata => ({ type: 'body', metatype });

  const rejectionMessages = async (body: object, metadata: ArgumentMetadata): Promise<unknown> => {
    try {
      await pipe.transform(body, metadata);
    } catch (error) {
      expect(error).toBeInstanceOf(BadRequestException);
      if (error instanceof BadRequestException) {
        const response = error.getResponse();
        return typeof response === 'object' && 'message' in response ? response.message : response;
      }
    }
    throw new Error('expected the body to be rejected');
  };

  const tripBody = {
    destination: 'Rome',
    startDate: '2025-09-10',
    endDate: '2025-09-14',
    adults: 2,
    totalBudget: 1500,
    interests: ['Art'],
  };

  it('should accept a complete trip body', async () => {
    const dto = await pipe.transform({ ...tripBody }, bodyOf(PlanTripDto));

    expect(dto).toBeInstanceOf(PlanTripDto);
    expect(dto).toEqual(expect.objectContaining({ destination: 'Rome', adults: 2 }));
  });

  it('should reject a trip body without a destination', async () => {
    const { destination: _destination, ...body } = tripBody;

    expect(await rejectionMessages(body, bodyOf(PlanTripDto))).toEqual([VALIDATION_MESSAGES.destination]);
  });

  it('should reject a trip body without dates, budget or interests', async () => {
    const messages = await rejectionMessages({ destination: 'Rome', adults: 2 }, bodyOf(PlanTripDto));

    expect(messages).toEqual([
      VALIDATION_MESSAGES.dates,
      VALIDATION_MESSAGES.dates,
      VALIDATION_MESSAGES.budget,
      VALIDATION_MESSAGES.interests,
    ]);
  });

  it('should reject a trip body with a null adult count', async () => {
    expect(await rejectionMessages({ ...tripBody, adults: null }, bodyOf(PlanTripDto))).toEqual([
      VALIDATION_MESSAGES.adults,
    ]);
  });

  it('should reject an empty budget preview body', async () => {
    expect(await rejectionMessages({}, bodyOf(BudgetPreviewDto))).toEqual([VALIDATION_MESSAGES.budget]);
  });

  it('should reject a refinement without history', async () => {
    expect(await rejectionMessages({ input: 'More museums' }, bodyOf(RefineItineraryDto))).toEqual([
      'history should not be null or undefined',
    ]);
  });

  it('should reject a refinement without input', async () => {
    expect(await rejectionMessages({ history: [] }, bodyOf(RefineItineraryDto))).toEqual([
      VALIDATION_MESSAGES.refinement,
    ]);
  });
});
