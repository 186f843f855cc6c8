import { describe, it, expect } from 'vitest';
import { TestSynthesizer, exampleValue, testCaseId } from '../../src/generators/test-synthesizer.js';
import { checkConformance } from '../../src/generators/conformance.js';
import { ModelBuilder } from '../../src/generators/model-builder.js';
import { inferSchema, joinSchemas } from '../../src/generators/schema-inferrer.js';
import { CancelledError } from '../../src/core/errors.js';
import type { ApiDefinition } from '../../src/types/index.js';
import { exchanges, harEntry, jsonEntry } from '../helpers/har.js';

function definition(overrides: Partial<ApiDefinition> = {}): ApiDefinition {
  return {
    key: 'POST /orders/{id}/items',
    method: 'POST',
    pathTemplate: '/orders/{id}/items',
    description: 'POST /orders/{id}/items',
    hosts: ['api.example.com'],
    sampleCount: 1,
    observedStatuses: [201],
    request: {
      pathParams: { id: { schema: { kind: 'number', integer: true }, required: true, example: '7' } },
      headers: {
        'x-api-key': { schema: { kind: 'string' }, required: true, example: 'test-key' },
        'x-trace': { schema: { kind: 'string' }, required: false, example: 'abc' },
      },
      queryParams: {
        dryRun: { schema: { kind: 'boolean' }, required: true, example: 'true' },
        page: { schema: { kind: 'number', integer: true }, required: false, example: '2' },
      },
      bodySchema: inferSchema({ sku: 'A1', qty: 2 }),
    },
    response: {
      statusCode: 201,
      headers: { location: { schema: { kind: 'string' }, required: true, example: '/orders/7/items/1' } },
      bodySchema: inferSchema({ id: 1, sku: 'A1' }),
    },
    ...overrides,
  };
}

describe('TestSynthesizer', () => {
  const synthesizer = new TestSynthesizer();

  it('should instantiate the request from recorded examples', () => {
    const testCase = synthesizer.synthesizeOne(definition());

    expect(testCase.id).toBe('tc-post-orders-id-items');
    expect(testCase.apiDefinitionRef).toBe('POST /orders/{id}/items');
    expect(testCase.name).toBe('POST /orders/{id}/items');
    expect(testCase.type).toBe('functional');
    expect(testCase.status).toBe('draft');
    expect(testCase.request).toEqual({
      method: 'POST',
      path: '/orders/7/items',
      headers: { 'x-api-key': 'test-key' },
      query: { dryRun: 'true' },
      body: { sku: 'A1', qty: 2 },
    });
    expect(testCase.tags).toEqual(['post', 'orders']);
  });

  it('should assert status, headers, schema and required fields in order', () => {
    const def = definition();
    const testCase = synthesizer.synthesizeOne(def);

    expect(testCase.expectedResponse).toEqual({
      status: 201,
      schema: def.response.bodySchema,
      assertions: [
        { type: 'status-equals', expected: 201 },
        { type: 'header-present', header: 'location' },
        { type: 'json-schema', schema: def.response.bodySchema },
        { type: 'field-present', field: 'id' },
        { type: 'field-present', field: 'sku' },
      ],
    });
  });

  it('should skip the schema assertion for blob and empty bodies', () => {
    const def = definition({
      response: { statusCode: 204, headers: {}, bodySchema: { kind: 'absent' } },
    });

    expect(synthesizer.synthesizeOne(def).expectedResponse.assertions).toEqual([
      { type: 'status-equals', expected: 204 },
    ]);
  });

  it('should leave the body out when the request had none', () => {
    const def = definition({
      request: { pathParams: {}, headers: {}, queryParams: {}, bodySchema: { kind: 'absent' } },
    });

    expect('body' in synthesizer.synthesizeOne(def).request).toBe(false);
  });

  it('should suffix ids that collide', () => {
    const first = definition({ key: 'GET /a-b', method: 'GET', pathTemplate: '/a-b' });
    const second = definition({ key: 'GET /a/b', method: 'GET', pathTemplate: '/a/b' });
    const third = definition({ key: 'GET /a_b', method: 'GET', pathTemplate: '/a_b' });

    const ids = synthesizer.synthesize([first, second, third]).map((tc) => tc.id);

    expect(ids).toEqual(['tc-get-a-b', 'tc-get-a-b-2', 'tc-get-a-b-3']);
  });

  it('should not reuse an id that a suffix already produced', () => {
    const paths = ['/users/{id}', '/users/id', '/users-id-2'];
    const defs = paths.map((path) => definition({ key: `GET ${path}`, method: 'GET', pathTemplate: path }));

    expect(synthesizer.synthesize(defs).map((tc) => tc.id)).toEqual([
      'tc-get-users-id',
      'tc-get-users-id-2',
      'tc-get-users-id-2-2',
    ]);
    expect(synthesizer.synthesize([...defs].reverse()).map((tc) => tc.id)).toEqual([
      'tc-get-users-id-2',
      'tc-get-users-id',
      'tc-get-users-id-3',
    ]);
  });

  it('should stop when the signal is aborted', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => synthesizer.synthesize([definition()], { signal: controller.signal })).toThrow(CancelledError);
  });

  it('should produce requests whose recorded responses conform to the expectation', () => {
    const { definitions } = new ModelBuilder().build(
      exchanges([
        jsonEntry('https://api.example.com/users/1', { id: 1, name: 'Ann', tags: ['a'] }),
        jsonEntry('https://api.example.com/users/2', { id: 2, name: 'Bob', manager: null }),
        harEntry({ method: 'DELETE', url: 'https://api.example.com/users/2', status: 204 }),
      ]),
      () => true
    );

    const testCases = synthesizer.synthesize(definitions);

    expect(testCases.map((tc) => tc.id)).toEqual(['tc-get-users-id', 'tc-delete-users-id']);
    const schema = testCases[0].expectedResponse.schema;
    expect(checkConformance({ id: 1, name: 'Ann', tags: ['a'] }, schema)).toEqual([]);
    expect(checkConformance({ id: 2, name: 'Bob', manager: null }, schema)).toEqual([]);
  });
});

describe('testCaseId', () => {
  it('should fall back to root for the root path', () => {
    expect(testCaseId(definition({ method: 'GET', pathTemplate: '/' }))).toBe('tc-get-root');
  });
});

describe('exampleValue', () => {
  it('should prefer recorded examples', () => {
    expect(exampleValue(inferSchema({ id: 5, email: 'a@example.com' }))).toEqual({ id: 5, email: 'a@example.com' });
  });

  it('should fill in defaults by kind and format', () => {
    expect(exampleValue({ kind: 'number', integer: true })).toBe(1);
    expect(exampleValue({ kind: 'number', integer: false })).toBe(1.5);
    expect(exampleValue({ kind: 'boolean' })).toBe(true);
    expect(exampleValue({ kind: 'string', format: 'uuid' })).toBe('00000000-0000-4000-8000-000000000000');
    expect(exampleValue({ kind: 'string' })).toBe('string');
    expect(exampleValue({ kind: 'unknown' })).toBeNull();
    expect(exampleValue({ kind: 'array', items: { kind: 'absent' } })).toEqual([]);
  });

  it('should skip optional fields and pick the first non-null variant', () => {
    const schema = joinSchemas(inferSchema({ a: null, b: 1 }), inferSchema({ a: 'x' }));

    expect(exampleValue(schema)).toEqual({ a: 'x' });
  });
});

describe('checkConformance', () => {
  const schema = inferSchema({ id: 1, name: 'Ann', tags: ['a'] });

  it('should accept conforming values', () => {
    expect(checkConformance({ id: 9, name: 'Zed', tags: [] }, schema)).toEqual([]);
  });

  it('should report type mismatches with their location', () => {
    expect(checkConformance({ id: 1.5, name: 'Ann', tags: ['a', 3] }, schema)).toEqual([
      '$.id: expected integer, got number',
      '$.tags[1]: expected string, got integer',
    ]);
  });

  it('should report missing required fields', () => {
    expect(checkConformance({ id: 1, tags: [] }, schema)).toEqual(['$.name: required field missing']);
  });

  it('should report a wrong top-level shape', () => {
    expect(checkConformance([1], schema)).toEqual([
      '$: expected { id: integer; name: string; tags: string[] }, got array',
    ]);
  });

  it('should accept anything for blobs and unknown', () => {
    expect(checkConformance('raw', { kind: 'blob', mimeType: 'image/png' })).toEqual([]);
    expect(checkConformance(42, { kind: 'unknown' })).toEqual([]);
  });
});
