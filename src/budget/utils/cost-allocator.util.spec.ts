// src/budget/utils/cost-allocator.util.spec.ts

import { CostAllocator } from './cost-allocator.util';

describe('CostAllocator', () => {
  describe('allocate', () => {
    it('should split 1000 into food 300, local travel 150, tickets 100 and lodging 450', () => {
      const breakdown = CostAllocator.allocate(1000);

      expect(breakdown.food).toBeCloseTo(300);
      expect(breakdown.localTravel).toBeCloseTo(150);
      expect(breakdown.tickets).toBeCloseTo(100);
      expect(breakdown.lodgingBudget).toBeCloseTo(450);
    });

    it('should always add back up to the total for positive budgets', () => {
      for (const total of [1, 99.99, 250, 1234.56, 50000]) {
        const breakdown = CostAllocator.allocate(total);
        expect(CostAllocator.total(breakdown)).toBeCloseTo(total, 6);
        expect(breakdown.lodgingBudget).toBeGreaterThanOrEqual(0);
      }
    });

    it('should honour a custom share policy', () => {
      const breakdown = CostAllocator.allocate(1000, { food: 0.2, localTravel: 0.3, tickets: 0.2 });

      expect(breakdown.food).toBeCloseTo(200);
      expect(breakdown.localTravel).toBeCloseTo(300);
      expect(breakdown.tickets).toBeCloseTo(200);
      expect(breakdown.lodgingBudget).toBeCloseTo(300);
    });

    it('should floor the lodging budget at 0 for non-positive budgets', () => {
      expect(CostAllocator.allocate(0).lodgingBudget).toBe(0);
      expect(CostAllocator.allocate(-200).lodgingBudget).toBe(0);
    });

    it('should return a frozen breakdown', () => {
      expect(Object.isFrozen(CostAllocator.allocate(500))).toBe(true);
    });
  });
});
