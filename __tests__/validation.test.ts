import { describe, it, expect } from 'vitest';
import { parseAgreementPatch, parseNewAgreement, parseNewPurchaseOrder } from '../src/domain/validation';
import { ValidationError } from '../src/errors';
import { baseAgreementInput } from './helpers/fixtures';

describe('Input Validation', () => {
  describe('parseNewAgreement', () => {
    it('should apply defaults for currency and status', () => {
      const parsed = parseNewAgreement(baseAgreementInput);

      expect(parsed.currency).toBe('SAR');
      expect(parsed.status).toBe('Pipeline');
      expect(parsed.statusDate).toBeUndefined();
    });

    it('should accept compact enum spellings and store the canonical value', () => {
      const parsed = parseNewAgreement({
        ...baseAgreementInput,
        customerSegment: 'SmartCity',
        agreementType: 'BlanketPO',
        currency: ' usd ',
      });

      expect(parsed.customerSegment).toBe('Smart City');
      expect(parsed.agreementType).toBe('Blanket PO');
      expect(parsed.currency).toBe('USD');
    });

    it('should coerce numeric strings from CSV cells', () => {
      const parsed = parseNewAgreement({ ...baseAgreementInput, valueCeiling: '2500000', probabilityToSign: '40' });

      expect(parsed.valueCeiling).toBe(2_500_000);
      expect(parsed.probabilityToSign).toBe(40);
    });

    it('should turn blank optional text into null', () => {
      expect(parseNewAgreement({ ...baseAgreementInput, region: '   ' }).region).toBeNull();
    });

    it('should reject a non-positive ceiling', () => {
      expect(() => parseNewAgreement({ ...baseAgreementInput, valueCeiling: 0 })).toThrow(
        'Invalid agreement: valueCeiling: must be greater than 0',
      );
    });

    it('should reject missing required fields', () => {
      const { name: _name, accountManager: _manager, ...rest } = baseAgreementInput;

      try {
        parseNewAgreement(rest);
        expect.unreachable('validation should have failed');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.code).toBe('VALIDATION_ERROR');
          expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['name', 'accountManager']);
        }
      }
    });

    it('should reject an empty customer name', () => {
      expect(() => parseNewAgreement({ ...baseAgreementInput, customerName: '  ' })).toThrow(
        'Invalid agreement: customerName: is required',
      );
    });

    it('should reject unknown enum values', () => {
      expect(() => parseNewAgreement({ ...baseAgreementInput, status: 'Won' })).toThrow(ValidationError);
      expect(() => parseNewAgreement({ ...baseAgreementInput, currency: 'GBP' })).toThrow(ValidationError);
      expect(() => parseNewAgreement({ ...baseAgreementInput, customerSegment: 'Startup' })).toThrow(ValidationError);
    });

    it('should reject probabilities outside 0-100', () => {
      expect(() => parseNewAgreement({ ...baseAgreementInput, probabilityToSign: 101 })).toThrow(ValidationError);
      expect(() => parseNewAgreement({ ...baseAgreementInput, probabilityToSign: -1 })).toThrow(ValidationError);
    });

    it('should reject malformed dates', () => {
      expect(() => parseNewAgreement({ ...baseAgreementInput, signedDate: '2026-02-30' })).toThrow(
        'Invalid agreement: signedDate: must be a YYYY-MM-DD date',
      );
    });
  });

  describe('parseAgreementPatch', () => {
    it('should only contain the keys that were given', () => {
      expect(parseAgreementPatch({ notes: 'Renewal discussed' })).toEqual({ notes: 'Renewal discussed' });
    });

    it('should still validate the keys that were given', () => {
      expect(() => parseAgreementPatch({ valueCeiling: -5 })).toThrow(ValidationError);
      expect(() => parseAgreementPatch({ name: '' })).toThrow(ValidationError);
    });
  });

  describe('parseNewPurchaseOrder', () => {
    it('should default the currency to SAR', () => {
      const parsed = parseNewPurchaseOrder({ agreementId: 'AGR-2026-0001', value: 100, date: '2026-03-01' });
      expect(parsed).toEqual({ agreementId: 'AGR-2026-0001', value: 100, date: '2026-03-01', currency: 'SAR' });
    });

    it('should reject a non-positive value', () => {
      expect(() => parseNewPurchaseOrder({ agreementId: 'AGR-2026-0001', value: 0, date: '2026-03-01' })).toThrow(
        'Invalid purchase order: value: must be greater than 0',
      );
    });
  });
});
