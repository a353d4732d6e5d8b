// src/itinerary/services/itinerary-prompt-builder.service.spec.ts

import { Test, TestingModule } from '@nestjs/testing';
import { ItineraryPromptBuilderService, formatAmount } from './itinerary-prompt-builder.service';
import { PLANNER_SETTINGS, DEFAULT_PLANNER_SETTINGS } from '../../planning/config/planner-settings.config';
import { CostAllocator } from '../../budget/utils/cost-allocator.util';
import { TripRequest } from '../interfaces/trip.interface';
import { PromptHotel } from '../interfaces/itinerary-prompt.interface';

describe('ItineraryPromptBuilderService', () => {
  let builder: ItineraryPromptBuilderService;

  const trip: TripRequest = {
    destination: 'Edinburgh',
    location: { lat: 55.9533, lng: -3.1883 },
    startDate: '2025-06-01',
    endDate: '2025-06-06',
    adults: 2,
    children: 1,
    totalBudget: 1000,
    interests: ['History', 'Food'],
    accommodationTypes: [],
    minAccommodationRating: 3,
  };

  const brief = (attractionsText: string, budgetText = '£1000'): string =>
    [
      'You are a helpful tour planner.',
      'Create a day-by-day itinerary, within 1000 words or less,',
      'for a trip to Edinburgh,',
      'for 2 adults and 1 children,',
      'from 2025-06-01 to 2025-06-06,',
      `within a budget of ${budgetText}, and`,
      'with focus on the below interests History, Food.',
      `Include places like, ${attractionsText}, in the itinerary and`,
      'factor the forecasted weather, like light rain while building the itinerary.',
    ].join('\n');

  const hotel = (name: string, overrides: Partial<PromptHotel> = {}): PromptHotel => ({
    name,
    types: ['lodging'],
    ...overrides,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ItineraryPromptBuilderService,
        { provide: PLANNER_SETTINGS, useValue: DEFAULT_PLANNER_SETTINGS },
      ],
    }).compile();

    builder = module.get<ItineraryPromptBuilderService>(ItineraryPromptBuilderService);
  });

  describe('build', () => {
    it('should build a brief with placeholders and the budget directive when nothing else is known', () => {
      const prompt = builder.build({ trip, attractions: [], weather: 'light rain', shortlist: [] });

      expect(prompt.text).toBe(
        `${brief('No specific attractions found')}\n\n` +
          'STRICT RULE: Total cost MUST NOT exceed £1000. Prioritize free/cheap options first.'
      );
      expect(prompt.record.listedHotels).toEqual([]);
      expect(prompt.record.accommodationSection).toBeNull();
      expect(prompt.record.budgetGuide).toBeNull();
      expect(prompt.record.breakdown).toBeNull();
      expect(prompt.record.tripDuration).toBeNull();
    });

    it('should list hotels, the budget guide and the recommendation instructions', () => {
      const breakdown = CostAllocator.allocate(1000);
      const prompt = builder.build({
        trip,
        attractions: ['Edinburgh Castle', 'Royal Mile'],
        weather: 'light rain',
        shortlist: [
          hotel('Canal Rooms', {
            rating: 4.5,
            priceLevel: 1,
            vicinity: '12 Canal St',
            userRatingsTotal: 120,
            estimatedNightlyRate: 75,
            estimatedTotalStayCost: 375,
          }),
          hotel('Mystery Lodge'),
          hotel('Hill Camp', {
            rating: '3.9',
            priceLevel: 0,
            vicinity: 'Hillside',
            userRatingsTotal: 4,
            estimatedNightlyRate: 50,
            estimatedTotalStayCost: 250,
          }),
        ],
        breakdown,
        tripDuration: 5,
      });

      expect(prompt.text).toBe(
        [
          brief('Edinburgh Castle, Royal Mile'),
          [
            'Consider these accommodation options (sorted by rating, then reviews):',
            '1. Canal Rooms - Rating: 4.5, Reviews: 120, Price Level: £, Location: 12 Canal St, Est. £75/night, Est. total £375 for 5 nights',
            '2. Mystery Lodge - Rating: Not rated, Reviews: 0, Price Level: Price unknown, Location: Address not available',
            '3. Hill Camp - Rating: 3.9, Reviews: 4, Price Level: Inexpensive, Location: Hillside, Est. £50/night, Est. total £250 for 5 nights',
          ].join('\n'),
          'Budget guide: lodging budget ≈ £450 after allocating food (£300), local travel (£150), and tickets (£100).',
          [
            'Start the itinerary with a section titled "RECOMMENDED ACCOMMODATION" that lists 1-3 suitable options based on the budget and trip details.',
            "For each accommodation, include the name, approximate price per night, and a brief explanation of why it's recommended (location to attractions, amenities, etc.)",
          ].join('\n'),
          'STRICT RULE: Total cost MUST NOT exceed £1000. Prioritize free/cheap options first.',
        ].join('\n\n')
      );
      expect(prompt.record.listedHotels).toEqual(['Canal Rooms', 'Mystery Lodge', 'Hill Camp']);
      expect(prompt.record.breakdown).toBe(breakdown);
      expect(prompt.record.tripDuration).toBe(5);
    });

    it('should include the budget guide without hotels when a breakdown is given', () => {
      const prompt = builder.build({
        trip,
        attractions: [],
        weather: 'light rain',
        shortlist: [],
        breakdown: CostAllocator.allocate(1000),
      });

      expect(prompt.record.budgetGuide).toBe(
        'Budget guide: lodging budget ≈ £450 after allocating food (£300), local travel (£150), and tickets (£100).'
      );
      expect(prompt.text).not.toContain('RECOMMENDED ACCOMMODATION');
      expect(prompt.text.endsWith('Prioritize free/cheap options first.')).toBe(true);
    });

    it('should list at most five hotels', () => {
      const shortlist = ['H1', 'H2', 'H3', 'H4', 'H5', 'H6', 'H7'].map((name) => hotel(name, { rating: 4 }));
      const prompt = builder.build({ trip, attractions: [], weather: 'light rain', shortlist });

      expect(prompt.record.listedHotels).toEqual(['H1', 'H2', 'H3', 'H4', 'H5']);
      expect(prompt.record.accommodationSection?.split('\n')).toHaveLength(6);
    });

    it('should leave out cost estimates when the trip duration is unknown', () => {
      const prompt = builder.build({
        trip,
        attractions: [],
        weather: 'light rain',
        shortlist: [
          hotel('Canal Rooms', {
            rating: 4.5,
            priceLevel: 1,
            vicinity: '12 Canal St',
            userRatingsTotal: 120,
            estimatedNightlyRate: 75,
            estimatedTotalStayCost: 375,
          }),
        ],
      });

      expect(prompt.record.accommodationSection).toBe(
        [
          'Consider these accommodation options (sorted by rating, then reviews):',
          '1. Canal Rooms - Rating: 4.5, Reviews: 120, Price Level: £, Location: 12 Canal St',
        ].join('\n')
      );
    });

    it('should print fractional budgets with two decimals', () => {
      const prompt = builder.build({
        trip: { ...trip, totalBudget: 1234.5 },
        attractions: [],
        weather: 'light rain',
        shortlist: [],
      });

      expect(prompt.text).toBe(
        `${brief('No specific attractions found', '£1234.50')}\n\n` +
          'STRICT RULE: Total cost MUST NOT exceed £1234.50. Prioritize free/cheap options first.'
      );
    });
  });

  describe('priceGlyph', () => {
    it('should repeat the currency symbol per tier', () => {
      expect(builder.priceGlyph(1)).toBe('£');
      expect(builder.priceGlyph(3)).toBe('£££');
    });

    it('should not describe the lowest tier as free', () => {
      expect(builder.priceGlyph(0)).toBe('Inexpensive');
    });

    it('should report non-tier values as unknown', () => {
      expect(builder.priceGlyph(undefined)).toBe('Price unknown');
      expect(builder.priceGlyph(null)).toBe('Price unknown');
      expect(builder.priceGlyph(1.5)).toBe('Price unknown');
      expect(builder.priceGlyph(5)).toBe('Price unknown');
      expect(builder.priceGlyph('2')).toBe('Price unknown');
    });

    it('should use the configured currency symbol', async () => {
      const module = await Test.createTestingModule({
        providers: [
          ItineraryPromptBuilderService,
          { provide: PLANNER_SETTINGS, useValue: { ...DEFAULT_PLANNER_SETTINGS, currencySymbol: '€' } },
        ],
      }).compile();
      const euroBuilder = module.get<ItineraryPromptBuilderService>(ItineraryPromptBuilderService);

      expect(euroBuilder.priceGlyph(2)).toBe('€€');
      expect(euroBuilder.build({ trip, attractions: [], weather: 'sunny', shortlist: [] }).record.closingDirective).toBe(
        'STRICT RULE: Total cost MUST NOT exceed €1000. Prioritize free/cheap options first.'
      );
    });
  });

  describe('formatAmount', () => {
    it('should keep whole numbers and round fractions to cents', () => {
      expect(formatAmount(450)).toBe('450');
      expect(formatAmount(99.999)).toBe('100.00');
      expect(formatAmount(12.3)).toBe('12.30');
    });
  });
});
