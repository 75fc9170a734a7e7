/**
 * Tests for the ApiDiffer
 */

import * as fs from 'fs';
import * as path from 'path';
import { ApiDiffer } from '../src/differ';

const BASE = path.join(__dirname, 'fixtures', 'base.yaml');
const CURRENT = path.join(__dirname, 'fixtures', 'current.json');

describe('ApiDiffer', () => {
  // ─── Files ────────────────────────────────────────────────────────────

  describe('compareFiles', () => {
    test('compares a YAML document with a JSON document', async () => {
      const differ = new ApiDiffer();
      const report = await differ.compareFiles(BASE, CURRENT);

      expect(report.base).toBe(BASE);
      expect(report.current).toBe(CURRENT);
      expect(
        report.results.map((r) => [r.name, r.violations.map((v) => `${v.name}:${v.path}`)])
      ).toEqual([
        ['Address', ['PropertyAdded:zip']],
        ['Legacy', ['SchemaRemoved:']],
        ['NewModel', ['SchemaAdded:']],
        ['Status', ['EnumValuesRemoved:', 'EnumValuesAdded:']],
        [
          'User',
          [
            'PropertyAdded:address.zip',
            'NullableChanged:age',
            'PropertyRemoved:name',
            'RequiredPropertyAdded:username',
          ],
        ],
      ]);
    });

    test('summarises the fixture drift', async () => {
      const report = await new ApiDiffer().compareFiles(BASE, CURRENT);

      expect(report.summary).toEqual({
        breaking: 5,
        warning: 0,
        change: 4,
        total: 9,
        schemas: { added: 1, removed: 1, modified: 3, unchanged: 0 },
      });
      expect(report.compatibilityScore).toBe(21);
      expect(report.hasBreakingChanges).toBe(true);
    });

    test('reads 3.1 null unions as nullable', async () => {
      const report = await new ApiDiffer().compareFiles(BASE, CURRENT);
      const address = report.schemas.find((s) => s.name === 'Address');

      expect(address?.properties.find((p) => p.name === 'zip')).toMatchObject({
        type: 'string',
        nullable: true,
        required: false,
      });
    });

    test('describes current schemas', async () => {
      const report = await new ApiDiffer().compareFiles(BASE, CURRENT);
      const user = report.schemas.find((s) => s.name === 'User');

      expect(report.schemas.map((s) => s.name)).toEqual(['Address', 'NewModel', 'Status', 'User']);
      expect(user?.properties.map((p) => `${p.name}:${p.type}`)).toEqual([
        'id:integer',
        'username:string',
        'address:Address',
        'age:integer',
      ]);
      expect(user?.schemaViolations.map((v) => v.name)).toEqual(['PropertyRemoved']);
    });

    test('rejects a missing file', async () => {
      const missing = path.join(__dirname, 'fixtures', 'nope.yaml');
      await expect(new ApiDiffer().compareFiles(BASE, missing)).rejects.toThrow(
        'Unable to read document'
      );
    });
  });

  // ─── Documents ────────────────────────────────────────────────────────

  describe('compareDocuments', () => {
    test('accepts raw text', () => {
      const differ = new ApiDiffer();
      const report = differ.compareDocuments(
        fs.readFileSync(BASE, 'utf-8'),
        fs.readFileSync(CURRENT, 'utf-8')
      );

      expect(report.base).toBe('base');
      expect(report.summary.total).toBe(9);
    });

    test('accepts parsed Swagger 2 documents', () => {
      const base = {
        swagger: '2.0',
        definitions: { Pet: { type: 'object', properties: { id: { type: 'integer' } } } },
      };
      const current = {
        swagger: '2.0',
        definitions: { Pet: { type: 'object', properties: { id: { type: 'string' } } } },
      };

      const report = new ApiDiffer().compareDocuments(base, current, { base: 'a', current: 'b' });
      expect(report.results[0].violations.map((v) => v.description)).toEqual([
        "Type changed from 'integer' to 'string'",
      ]);
    });

    test('rejects documents that are not objects', () => {
      expect(() => new ApiDiffer().compareDocuments('- a\n- b', '{}')).toThrow(
        'Document is not an object'
      );
    });
  });

  // ─── Options ──────────────────────────────────────────────────────────

  describe('options', () => {
    test('minSeverity and changedOnly trim the report', async () => {
      const differ = new ApiDiffer({ minSeverity: 'breaking', changedOnly: true });
      const report = await differ.compareFiles(BASE, CURRENT);

      expect(report.results.map((r) => r.name)).toEqual(['Legacy', 'Status', 'User']);
      expect(report.summary.total).toBe(5);
      expect(report.compatibilityScore).toBe(25);
    });

    test('maxDepth limits reference traversal', () => {
      const differ = new ApiDiffer({ maxDepth: 1 });
      const report = differ.compare(
        {
          User: { type: 'object', properties: { address: { $ref: '#/components/schemas/Address' } } },
          Address: { type: 'object', properties: { city: { type: 'string' } } },
        },
        {
          User: { type: 'object', properties: { address: { $ref: '#/components/schemas/Address' } } },
          Address: { type: 'object', properties: {} },
        }
      );

      expect(report.results.map((r) => [r.name, r.violations.length])).toEqual([
        ['Address', 1],
        ['User', 0],
      ]);
    });
  });

  test('format delegates to the reporter', () => {
    const differ = new ApiDiffer();
    const report = differ.compare({}, {});

    expect(JSON.parse(differ.format(report, 'json'))).toMatchObject({
      base: 'base',
      current: 'current',
      results: [],
    });
  });
});
