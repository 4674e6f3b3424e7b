/**
 * NEO Tool Handler Tests
 *
 * Runs the tool handlers against the fixture data files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { inspectNeo, queryApproaches } from '../../../src/tools/neo-tools.js';
import { initServerConfig, resetServerState } from '../../../src/server/server-config.js';
import { ErrorCode } from '../../../src/shared/errors/index.js';
import { CAD_FIXTURE, NEO_FIXTURE } from '../../fixtures/neo-test-utils.js';

describe('NEO tools', () => {
  beforeEach(() => {
    resetServerState();
    initServerConfig(['--neofile', NEO_FIXTURE, '--cadfile', CAD_FIXTURE]);
  });

  afterEach(() => {
    resetServerState();
  });

  describe('inspectNeo', () => {
    it('should find a NEO by designation', async () => {
      const result = await inspectNeo({ designation: '433' });

      expect(result).toEqual({
        found: true,
        description: 'NEO 433 Eros has a diameter of 16.840 km and is not potentially hazardous.',
        neo: {
          designation: '433',
          name: 'Eros',
          diameter_km: 16.84,
          potentially_hazardous: false,
        },
        approaches: undefined,
      });
    });

    it('should upper-case the designation before matching', async () => {
      const result = await inspectNeo({ designation: '2010 ca' });

      expect(result.description).toBe('NEO 2010 CA has an unknown diameter and is not potentially hazardous.');
    });

    it('should find a NEO by name and list approaches when verbose', async () => {
      const result = await inspectNeo({ name: 'adonis', verbose: true });

      expect(result.found).toBe(true);
      expect(result.approaches).toEqual([
        {
          datetime_utc: '1900-04-19 12:30',
          distance_au: 0.0312,
          velocity_km_s: 21.2,
          description:
            "At 1900-04-19 12:30, '2101 Adonis' approaches Earth at a distance of 0.03 au and a velocity of 21.20 km/s.",
        },
      ]);
    });

    it('should list every approach of a NEO in data-file order', async () => {
      const result = await inspectNeo({ designation: '433', verbose: true });

      expect(result.approaches?.map((approach) => approach.datetime_utc)).toEqual([
        '1900-01-01 00:00',
        '2020-12-30 04:55',
      ]);
      expect(result.approaches?.[0].description).toBe(
        "At 1900-01-01 00:00, '433 Eros' approaches Earth at a distance of 0.31 au and a velocity of 5.50 km/s.",
      );
    });

    it('should report a miss', async () => {
      await expect(inspectNeo({ designation: '99942' })).resolves.toEqual({ found: false });
      await expect(inspectNeo({ name: 'Apophis' })).resolves.toEqual({ found: false });
    });

    it('should require exactly one of designation or name', async () => {
      await expect(inspectNeo({})).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Provide exactly one of designation or name',
      });
      await expect(inspectNeo({ designation: '433', name: 'Eros' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
      });
    });

    it('should reject input of the wrong type', async () => {
      await expect(inspectNeo({ designation: 433 })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Invalid tool input',
      });
    });
  });

  describe('queryApproaches', () => {
    it('should return every approach in data-file order', async () => {
      const result = await queryApproaches({});

      expect(result.count).toBe(6);
      expect(result.results?.map((row) => row.neo.designation)).toEqual([
        '433',
        '2101',
        '2010 CA',
        '433',
        '99942',
        '719',
      ]);
    });

    it('should return approach fields, NEO fields and a description', async () => {
      const result = await queryApproaches({ limit: 1 });

      expect(result.results).toEqual([
        {
          datetime_utc: '1900-01-01 00:00',
          distance_au: 0.3149,
          velocity_km_s: 5.5,
          description:
            "At 1900-01-01 00:00, '433 Eros' approaches Earth at a distance of 0.31 au and a velocity of 5.50 km/s.",
          neo: {
            designation: '433',
            name: 'Eros',
            diameter_km: 16.84,
            potentially_hazardous: false,
          },
        },
      ]);
    });

    it('should describe an unlinked approach by its designation', async () => {
      const result = await queryApproaches({ start_date: '2029-01-01' });

      expect(result.results?.[0].description).toBe(
        "At 2029-04-13 21:46, '99942' approaches Earth at a distance of 0.00 au and a velocity of 7.42 km/s.",
      );
    });

    it.each([
      [{ distance_max: 0.05 }, 3],
      [{ hazardous: true }, 1],
      [{ hazardous: false }, 4],
      [{ start_date: '2020-01-01' }, 3],
      [{ start_date: '2020-01-01', end_date: '2020-12-31' }, 2],
      [{ date: '2020-12-30' }, 2],
      [{ velocity_min: 0 }, 5],
      [{ diameter_min: 1 }, 2],
      [{ distance_min: 0.2, velocity_max: 6 }, 1],
      [{ limit: 2 }, 2],
      [{ limit: 0 }, 6],
    ])('should filter %j down to %i results', async (input, expected) => {
      const result = await queryApproaches(input);

      expect(result.count).toBe(expected);
      expect(result.results).toHaveLength(expected);
    });

    it('should reject a negative limit', async () => {
      await expect(queryApproaches({ limit: -1 })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Invalid tool input',
      });
    });

    it('should reject a date that does not exist', async () => {
      await expect(queryApproaches({ date: '2020-02-30' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_ARGUMENT,
        message: 'Invalid date "2020-02-30", expected YYYY-MM-DD',
      });
    });

    describe('outfile', () => {
      let dir: string;

      beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'neo-tools-'));
      });

      afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
      });

      it('should write results to the file instead of returning them', async () => {
        const outfile = join(dir, 'hazardous.csv');

        const result = await queryApproaches({ hazardous: true, outfile });

        expect(result).toEqual({ count: 1, outfile });
        expect(await readFile(outfile, 'utf8')).toBe(
          'datetime_utc,distance_au,velocity_km_s,designation,name,diameter_km,potentially_hazardous\r\n' +
            '1900-04-19 12:30,0.0312,21.2,2101,Adonis,0.6,true\r\n',
        );
      });

      it('should reject an unsupported extension', async () => {
        await expect(queryApproaches({ outfile: join(dir, 'results.xml') })).rejects.toMatchObject({
          code: ErrorCode.UNSUPPORTED_OUTPUT_FORMAT,
        });
      });
    });
  });
});
