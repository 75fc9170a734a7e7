/**
 * Tests for Document Formats
 */

import * as path from 'path';
import { parseJson, isJson } from '../src/formats/json';
import { parseYaml } from '../src/formats/yaml';
import { extractSchemaTable, normalizeSchema } from '../src/formats/openapi';
import { autoParse, readDocument } from '../src/formats';

const fixture = (name: string) => path.join(__dirname, 'fixtures', name);

describe('Document Formats', () => {
  // ─── JSON Parser ──────────────────────────────────────────────────────

  describe('JSON Parser', () => {
    test('parses valid JSON object', () => {
      expect(parseJson('{"openapi": "3.1.0", "paths": {}}')).toEqual({
        openapi: '3.1.0',
        paths: {},
      });
    });

    test('handles BOM marker', () => {
      expect(parseJson('\uFEFF{"id": 1}')).toEqual({ id: 1 });
    });

    test('handles trailing commas (lenient)', () => {
      expect(parseJson('{"enum": ["a", "b",],}')).toEqual({ enum: ['a', 'b'] });
    });

    test('throws on invalid JSON', () => {
      expect(() => parseJson('{"openapi": }')).toThrow('Failed to parse JSON: ');
    });

    test('names the source in parse errors', () => {
      expect(() => parseJson('{"openapi": }', 'api.json')).toThrow(
        'Failed to parse JSON in "api.json": '
      );
    });

    test('isJson detects JSON objects and arrays', () => {
      expect(isJson('  {"id": 1}\n')).toBe(true);
      expect(isJson('[1, 2, 3]')).toBe(true);
    });

    test('isJson rejects YAML', () => {
      expect(isJson('openapi: 3.0.0\ninfo: {}')).toBe(false);
    });
  });

  // ─── YAML Parser ──────────────────────────────────────────────────────

  describe('YAML Parser', () => {
    test('parses a document', () => {
      const input = ['openapi: 3.0.3', 'components:', '  schemas:', '    Id:', '      type: string'].join(
        '\n'
      );

      expect(parseYaml(input)).toEqual({
        openapi: '3.0.3',
        components: { schemas: { Id: { type: 'string' } } },
      });
    });

    test('throws on invalid YAML', () => {
      expect(() => parseYaml('key: [unclosed')).toThrow('Failed to parse YAML: ');
      expect(() => parseYaml('key: [unclosed', 'api.yaml')).toThrow(
        'Failed to parse YAML in "api.yaml": '
      );
    });
  });

  // ─── Auto Parser ──────────────────────────────────────────────────────

  describe('Auto Parser', () => {
    test('auto-detects JSON', () => {
      expect(autoParse('{"openapi": "3.1.0"}')).toEqual({ openapi: '3.1.0' });
    });

    test('falls back to YAML', () => {
      expect(autoParse('openapi: 3.1.0\npaths: {}')).toEqual({ openapi: '3.1.0', paths: {} });
    });
  });

  // ─── Schema Normalisation ─────────────────────────────────────────────

  describe('normalizeSchema', () => {
    test('keeps only compared keywords', () => {
      const raw = {
        type: 'object',
        additionalProperties: false,
        example: { id: 1 },
        required: ['id', 3],
        properties: { id: { type: 'integer', minimum: 1 } },
      };

      expect(normalizeSchema(raw)).toEqual({
        type: 'object',
        required: ['id'],
        properties: { id: { type: 'integer' } },
      });
    });

    test('keeps references bare', () => {
      expect(normalizeSchema({ $ref: '#/components/schemas/User', description: 'owner' })).toEqual({
        $ref: '#/components/schemas/User',
      });
    });

    test('turns null in a type union into nullable', () => {
      expect(normalizeSchema({ type: ['string', 'null'] })).toEqual({
        type: 'string',
        nullable: true,
      });
      expect(normalizeSchema({ type: ['integer', 'string', 'null'] })).toEqual({
        type: ['integer', 'string'],
        nullable: true,
      });
    });

    test('keeps a lone null type', () => {
      expect(normalizeSchema({ type: 'null' })).toEqual({ type: 'null' });
    });

    test('reads nullable and x-nullable flags', () => {
      expect(normalizeSchema({ type: 'string', nullable: true })).toEqual({
        type: 'string',
        nullable: true,
      });
      expect(normalizeSchema({ type: 'string', 'x-nullable': true })).toEqual({
        type: 'string',
        nullable: true,
      });
    });

    test('drops unknown types', () => {
      expect(normalizeSchema({ type: 'file', format: 'binary' })).toEqual({ format: 'binary' });
    });

    test('keeps enum literals and normalises items', () => {
      expect(
        normalizeSchema({ type: 'array', items: { type: 'string', enum: ['a', 1, { x: [true] }] } })
      ).toEqual({
        type: 'array',
        items: { type: 'string', enum: ['a', 1, { x: [true] }] },
      });
    });

    test('non-object input becomes an empty schema', () => {
      expect(normalizeSchema('string')).toEqual({});
      expect(normalizeSchema(null)).toEqual({});
    });
  });

  // ─── Schema Table ─────────────────────────────────────────────────────

  describe('extractSchemaTable', () => {
    test('reads OpenAPI 3 components', () => {
      const doc = { openapi: '3.0.0', components: { schemas: { Id: { type: 'string' } } } };
      expect(extractSchemaTable(doc)).toEqual({ Id: { type: 'string' } });
    });

    test('reads Swagger 2 definitions', () => {
      const doc = { swagger: '2.0', definitions: { Id: { type: 'integer' } } };
      expect(extractSchemaTable(doc)).toEqual({ Id: { type: 'integer' } });
    });

    test('document without schemas yields an empty table', () => {
      expect(extractSchemaTable({ openapi: '3.1.0', paths: {} })).toEqual({});
    });

    test('rejects non-object documents', () => {
      expect(() => extractSchemaTable([1, 2])).toThrow('Document is not an object');
      expect(() => extractSchemaTable('openapi')).toThrow('Document is not an object');
    });
  });

  // ─── Files ────────────────────────────────────────────────────────────

  describe('readDocument', () => {
    test('reads YAML files', async () => {
      const table = extractSchemaTable(await readDocument(fixture('base.yaml')));
      expect(Object.keys(table).sort()).toEqual(['Address', 'Legacy', 'Status', 'User']);
      expect(table.Status).toEqual({ type: 'string', enum: ['active', 'inactive', 'pending'] });
    });

    test('reads JSON files', async () => {
      const table = extractSchemaTable(await readDocument(fixture('current.json')));
      expect(Object.keys(table).sort()).toEqual(['Address', 'NewModel', 'Status', 'User']);
    });

    test('names the file when it cannot be parsed', async () => {
      await expect(readDocument(fixture('broken.json'))).rejects.toThrow(
        `Failed to parse JSON in "${fixture('broken.json')}": `
      );
    });

    test('rejects missing files', async () => {
      await expect(readDocument(fixture('missing.yaml'))).rejects.toThrow(
        `Unable to read document "${fixture('missing.yaml')}"`
      );
    });
  });
});
