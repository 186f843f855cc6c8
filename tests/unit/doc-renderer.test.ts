import { describe, it, expect } from 'vitest';
import { renderMarkdown, renderOpenApi, toOpenApiSchema } from '../../src/generators/doc-renderer.js';
import { ModelBuilder } from '../../src/generators/model-builder.js';
import type { ApiDefinition } from '../../src/types/index.js';
import { exchanges, harEntry, jsonEntry } from '../helpers/har.js';

function catalogue(): ApiDefinition[] {
  return new ModelBuilder().build(
    exchanges([
      jsonEntry('https://api.example.com/users/1?verbose=true', { id: 1, name: 'Ann' }, {
        requestHeaders: { 'X-Api-Key': 'test-key' },
      }),
    ]),
    () => true
  ).definitions;
}

describe('renderMarkdown', () => {
  it('should render a placeholder for an empty catalogue', () => {
    expect(renderMarkdown([])).toBe('# API Documentation\n\nNo endpoints captured.\n');
  });

  it('should use a custom title', () => {
    expect(renderMarkdown([], { title: 'Shop API' }).split('\n')[0]).toBe('# Shop API');
  });

  it('should render the endpoint summary', () => {
    const markdown = renderMarkdown(catalogue());

    expect(markdown).toContain(
      [
        '## GET /users/{id}',
        '',
        'GET /users/{id}',
        '',
        'Hosts: `api.example.com`',
        'Samples: 1',
        'Observed statuses: 200',
      ].join('\n')
    );
  });

  it('should render parameter tables', () => {
    const markdown = renderMarkdown(catalogue());

    expect(markdown).toContain(
      [
        '#### Path parameters',
        '',
        '| Name | Type | Required | Example |',
        '|---|---|---|---|',
        '| id | integer | yes | `1` |',
      ].join('\n')
    );
    expect(markdown).toContain('| x-api-key | string | yes | `test-key` |');
    expect(markdown).toContain('| verbose | boolean | yes | `true` |');
    expect(markdown).toContain('| content-type | string | yes | `application/json` |');
  });

  it('should render the response body and an example', () => {
    const markdown = renderMarkdown(catalogue());

    expect(markdown).toContain(
      ['### Response', '', 'Status: `200`'].join('\n')
    );
    expect(markdown).toContain(['#### Body', '', '```', '{ id: integer; name: string }', '```'].join('\n'));
    expect(markdown).toContain(['```json', '{', '  "id": 1,', '  "name": "Ann"', '}', '```'].join('\n'));
  });

  it('should escape pipes in table cells', () => {
    const [definition] = catalogue();
    definition.request.headers['x-choice'] = { schema: { kind: 'string' }, required: false, example: 'a|b' };

    expect(renderMarkdown([definition])).toContain('| x-choice | string | no | `a\\|b` |');
  });
});

describe('renderOpenApi', () => {
  it('should describe the catalogue as an OpenAPI 3 document', () => {
    const document = renderOpenApi(catalogue());

    expect(document.openapi).toBe('3.0.3');
    expect(document.info).toEqual({
      title: 'API Documentation',
      version: '1.0.0',
      description: 'Generated from captured traffic',
    });
    expect(document.servers).toEqual([{ url: 'https://api.example.com' }]);
    expect(document.paths['/users/{id}'].get).toEqual({
      operationId: 'get-users-id',
      summary: 'GET /users/{id}',
      tags: ['users'],
      parameters: [
        { name: 'id', in: 'path', required: true, schema: { type: 'integer' }, example: '1' },
        { name: 'verbose', in: 'query', required: true, schema: { type: 'boolean' }, example: 'true' },
        { name: 'x-api-key', in: 'header', required: true, schema: { type: 'string' }, example: 'test-key' },
      ],
      responses: {
        '200': {
          description: 'Successful response',
          content: {
            'application/json': {
              schema: {
                type: 'object',
                properties: { id: { type: 'integer', example: 1 }, name: { type: 'string', example: 'Ann' } },
                required: ['id', 'name'],
              },
            },
          },
        },
      },
    });
  });

  it('should add a request body and list every observed status', () => {
    const { definitions } = new ModelBuilder().build(
      exchanges([
        harEntry({
          method: 'POST',
          url: 'https://api.example.com/orders',
          status: 201,
          requestBody: { mimeType: 'application/json', text: '{"sku":"A1"}' },
        }),
        harEntry({ method: 'POST', url: 'https://api.example.com/orders', status: 422 }),
      ]),
      () => true
    );

    const operation = renderOpenApi(definitions).paths['/orders'].post;

    expect(Object.keys(operation.responses)).toEqual(['201', '422']);
    expect(operation.responses['422']).toEqual({ description: 'Observed response' });
    expect(operation.responses['201'].description).toBe('Successful response');
    expect(operation.requestBody).toEqual({
      required: true,
      content: {
        'application/json': {
          schema: { type: 'object', properties: { sku: { type: 'string', example: 'A1' } }, required: ['sku'] },
        },
      },
    });
  });
});

describe('toOpenApiSchema', () => {
  it('should map null variants to nullable', () => {
    expect(toOpenApiSchema({ kind: 'union', variants: [{ kind: 'null' }, { kind: 'string' }] })).toEqual({
      type: 'string',
      nullable: true,
    });
  });

  it('should map mixed unions to oneOf', () => {
    expect(
      toOpenApiSchema({ kind: 'union', variants: [{ kind: 'number', integer: true }, { kind: 'string' }] })
    ).toEqual({ oneOf: [{ type: 'integer' }, { type: 'string' }] });
  });

  it('should map blobs to binary strings and unknown to an empty schema', () => {
    expect(toOpenApiSchema({ kind: 'blob', mimeType: 'image/png' })).toEqual({ type: 'string', format: 'binary' });
    expect(toOpenApiSchema({ kind: 'unknown' })).toEqual({});
  });
});
