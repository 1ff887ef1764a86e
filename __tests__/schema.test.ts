import { describe, it, expect } from 'vitest';
import { getTableName } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/pg-core';
import {
  agreements,
  pos,
  statusHistory,
  sequences,
  LEDGER_SCHEMA_NAME,
  type AgreementRow,
  type NewAgreementRow,
  type PORow,
  type NewPORow,
  type NewStatusHistoryRow,
  type SequenceRow,
} from '../src/schema';

describe('Database Schema Validation', () => {
  describe('Agreements Schema', () => {
    it('should have correct table name and schema', () => {
      expect(getTableName(agreements)).toBe('agreements');
      expect(getTableConfig(agreements).schema).toBe(LEDGER_SCHEMA_NAME);
    });

    it('should map fields to the stored column names', () => {
      expect(agreements.id.name).toBe('agreement_id');
      expect(agreements.name.name).toBe('agreement_name');
      expect(agreements.valueCeiling.name).toBe('agreement_value_ceiling');
      expect(agreements.lastUpdated.name).toBe('last_updated');
    });

    it('should not store derived fields', () => {
      const columns = getTableConfig(agreements).columns.map((column) => column.name);

      expect(columns).not.toContain('total_pos_value_to_date');
      expect(columns).not.toContain('utilization_percent');
      expect(columns).not.toContain('risk_flag');
      expect(columns).toHaveLength(24);
    });

    it('should export correct TypeScript types', () => {
      const row: AgreementRow = {
        id: 'AGR-2026-0001',
        name: 'Smart Parking Framework',
        customerName: 'Riyadh Municipality',
        customerSegment: 'Smart City',
        region: null,
        industry: null,
        agreementType: 'Framework',
        startDate: null,
        endDate: null,
        valueCeiling: '1000000',
        currency: 'SAR',
        status: 'Pipeline',
        statusDate: '2026-03-15',
        probabilityToSign: null,
        expectedSignatureDate: null,
        signedDate: null,
        accountManager: 'Sara Ahmed',
        salesOwner: null,
        partnershipsVendors: null,
        renewalTerms: null,
        notes: null,
        attachments: null,
        createdAt: new Date(),
        lastUpdated: new Date(),
      };

      expect(row.valueCeiling).toBe('1000000');
    });

    it('should support NewAgreementRow type for inserts', () => {
      const insert: NewAgreementRow = {
        id: 'AGR-2026-0002',
        name: 'Fleet Services',
        customerName: 'Gulf Retail Co',
        customerSegment: 'Enterprise',
        agreementType: 'Blanket PO',
        valueCeiling: '20000',
        statusDate: '2026-03-15',
        accountManager: 'Omar Haddad',
      };

      expect(insert.currency).toBeUndefined();
    });
  });

  describe('POs Schema', () => {
    it('should have correct table name', () => {
      expect(getTableName(pos)).toBe('pos');
      expect(pos.date.name).toBe('po_date');
      expect(pos.value.name).toBe('po_value');
    });

    it('should reference agreements with cascading deletes', () => {
      const [foreignKey] = getTableConfig(pos).foreignKeys;

      expect(getTableConfig(pos).foreignKeys).toHaveLength(1);
      expect(foreignKey.onDelete).toBe('cascade');
      expect(getTableName(foreignKey.reference().foreignTable)).toBe('agreements');
    });

    it('should export correct TypeScript types', () => {
      const insert: NewPORow = {
        id: 'PO-2026-0001-001',
        agreementId: 'AGR-2026-0001',
        date: '2026-03-15',
        value: '250.00',
        customerName: 'Riyadh Municipality',
      };
      const row: PORow = {
        ...insert,
        poNumber: null,
        currency: 'USD',
        accountManager: null,
        notes: null,
        createdAt: new Date(),
        lastUpdated: new Date(),
      };

      expect(row.value).toBe('250.00');
    });
  });

  describe('Status History Schema', () => {
    it('should have correct table name', () => {
      expect(getTableName(statusHistory)).toBe('status_history');
      expect(getTableConfig(statusHistory).foreignKeys[0].onDelete).toBe('cascade');
    });

    it('should allow a null old status for the initial entry', () => {
      const entry: NewStatusHistoryRow = {
        agreementId: 'AGR-2026-0001',
        oldStatus: null,
        newStatus: 'Pipeline',
      };

      expect(entry.oldStatus).toBeNull();
    });
  });

  describe('Sequences Schema', () => {
    it('should have correct table name', () => {
      expect(getTableName(sequences)).toBe('sequences');
      expect(sequences.name.name).toBe('seq_name');
    });

    it('should export correct TypeScript types', () => {
      const row: SequenceRow = { name: 'agreement-2026', value: 3 };
      expect(row.value).toBe(3);
    });
  });
});
