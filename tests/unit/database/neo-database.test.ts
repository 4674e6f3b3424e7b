/**
 * NEO Database Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { NeoDatabase } from '../../../src/database/neo-database.js';
import type { CloseApproach } from '../../../src/models/close-approach.js';
import { createFilters } from '../../../src/query/filters.js';
import { DuplicateDesignationError, ErrorCode, LinkageError } from '../../../src/shared/errors/index.js';
import { LoggingService } from '../../../src/shared/services/logging.service.js';
import {
  approachKeys,
  catchError,
  createTestApproach,
  createTestDatabase,
  createTestNeo,
} from '../../fixtures/neo-test-utils.js';

describe('NeoDatabase', () => {
  describe('linkage', () => {
    it('should link the single-object example end to end', () => {
      const neo = createTestNeo({ designation: '433', name: 'Eros', diameter: 16.84, hazardous: false });
      const approach = createTestApproach({
        designation: '433',
        time: '1900-Jan-01 00:00',
        distance: 0.32,
        velocity: 5.5,
      });
      const database = new NeoDatabase([neo], [approach]);

      expect(database.getNeoByDesignation('433')?.approaches).toHaveLength(1);
      expect([...database.query(createFilters({ distanceMax: 0.5 }))]).toEqual([approach]);
      expect([...database.query(createFilters({ distanceMax: 0.1 }))]).toEqual([]);
    });

    it('should set back-references and owner lists in input order', () => {
      const { neos, approaches } = createTestDatabase();
      const [eros, adonis, unnamed] = neos;

      expect(eros.approaches).toEqual([approaches[0], approaches[3]]);
      expect(adonis.approaches).toEqual([approaches[1]]);
      expect(unnamed.approaches).toEqual([approaches[2]]);
      expect(approaches[0].neo).toBe(eros);
      expect(approaches[3].neo).toBe(eros);
      expect(approaches[1].neo).toBe(adonis);
    });

    it('should leave orphan approaches unlinked', () => {
      const { approaches, neos } = createTestDatabase();
      const orphan = approaches[4];

      expect(orphan.neo).toBeNull();
      expect(neos.some((neo) => neo.approaches.includes(orphan))).toBe(false);
    });

    it('should list each linked approach exactly once', () => {
      const { neos, approaches } = createTestDatabase();
      const listed = neos.flatMap((neo) => [...neo.approaches]);

      for (const approach of approaches.filter((a) => a.neo !== null)) {
        expect(listed.filter((a) => a === approach)).toHaveLength(1);
      }
    });

    it('should reject duplicate designations', () => {
      const error = catchError(
        () => new NeoDatabase([createTestNeo(), createTestNeo({ name: 'Other' })], []),
      );

      expect(error).toBeInstanceOf(DuplicateDesignationError);
      expect(error).toMatchObject({
        code: ErrorCode.DUPLICATE_DESIGNATION,
        details: { designation: '433' },
      });
    });

    it('should refuse to relink approaches already owned by another database', () => {
      const { approaches } = createTestDatabase();

      expect(() => new NeoDatabase([createTestNeo()], approaches)).toThrow(LinkageError);
    });

    it('should report linkage counts', () => {
      const { database } = createTestDatabase();

      expect(database.getStats()).toEqual({
        neoCount: 3,
        approachCount: 5,
        linkedCount: 4,
        orphanCount: 1,
      });
    });

    it('should log the counts through the given logger', () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const logger = new LoggingService('debug');

      new NeoDatabase([createTestNeo()], [createTestApproach()], { logger });

      const [entry] = logger.getRecentLogs();
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('NEO database linked');
      expect(entry.context).toEqual({ neoCount: 1, approachCount: 1, linkedCount: 1, orphanCount: 0 });
    });
  });

  describe('getNeoByDesignation', () => {
    it('should find an exact designation', () => {
      const { database, neos } = createTestDatabase();

      expect(database.getNeoByDesignation('2101')).toBe(neos[1]);
    });

    it('should upper-case the input first', () => {
      const { database, neos } = createTestDatabase();

      expect(database.getNeoByDesignation('2010 ca')).toBe(neos[2]);
    });

    it('should return undefined on a miss', () => {
      const { database } = createTestDatabase();

      expect(database.getNeoByDesignation('99942')).toBeUndefined();
    });
  });

  describe('getNeoByName', () => {
    it('should capitalize the first letter only', () => {
      const { database, neos } = createTestDatabase();

      expect(database.getNeoByName('eros')).toBe(neos[0]);
      expect(database.getNeoByName('Adonis')).toBe(neos[1]);
      expect(database.getNeoByName('EROS')).toBeUndefined();
    });

    it('should not match unnamed objects', () => {
      const { database } = createTestDatabase();

      expect(database.getNeoByName('')).toBeUndefined();
    });
  });

  describe('query', () => {
    it('should yield every approach in input order without filters', () => {
      const { database, approaches } = createTestDatabase();

      expect([...database.query()]).toEqual(approaches);
      expect([...database.query([])]).toEqual(approaches);
    });

    it('should restart on every call', () => {
      const { database } = createTestDatabase();

      const first = approachKeys(database.query());
      const second = approachKeys(database.query());

      expect(second).toEqual(first);
      expect(first).toHaveLength(5);
    });

    it('should be lazy', () => {
      const { database, approaches } = createTestDatabase();
      const results = database.query();

      expect(results.next().value).toBe(approaches[0]);
      expect(results.next().value).toBe(approaches[1]);
    });

    it('should AND all filters together', () => {
      const { database } = createTestDatabase();

      const results = database.query(createFilters({ startDate: '1900-01-01', endDate: '1999-12-31', velocityMin: 10 }));

      expect(approachKeys(results)).toEqual(['2101@1900-04-19 12:30']);
    });

    it('should only shrink results as filters are added', () => {
      const { database } = createTestDatabase();
      const all = [...database.query(createFilters({ distanceMax: 0.3 }))];
      const narrowed = [...database.query(createFilters({ distanceMax: 0.3, hazardous: false }))];

      expect(approachKeys(all)).toEqual([
        '2101@1900-04-19 12:30',
        '2010 CA@2010-02-03 08:15',
        '433@2020-12-30 04:55',
        '99942@2029-04-13 21:46',
      ]);
      expect(approachKeys(narrowed)).toEqual(['2010 CA@2010-02-03 08:15', '433@2020-12-30 04:55']);
      expect(narrowed.every((approach: CloseApproach) => all.includes(approach))).toBe(true);
    });

    it('should not modify any entity', () => {
      const { database, neos } = createTestDatabase();
      const before = neos.map((neo) => neo.approaches.length);

      [...database.query(createFilters({ diameterMin: 0 }))];

      expect(neos.map((neo) => neo.approaches.length)).toEqual(before);
    });
  });
});
