/**
 * Tests for the model response parser
 *
 * Tests cover:
 * - decide: the three-way collapse over (is_invoice, confidence)
 * - sanitizers: supplier (null markers, owner names, length), date, amounts, currency
 * - interpretModelResponse: fences, prose around the object, malformed / missing keys,
 *   confidence clamping
 */

import { describe, it, expect } from 'vitest';

import {
  decide,
  extractJsonObject,
  interpretModelResponse,
  sanitizeAmount,
  sanitizeCurrency,
  sanitizeDate,
  sanitizeSupplier,
} from '../response-parser.js';

const options = { threshold: 0.5, ownerBusinessNames: ['my own company'] };

describe('decide', () => {
  it.each([
    [true, 0.9, 'invoice'],
    [false, 0.9, 'rejected'],
    [true, 0.3, 'review'],
    [false, 0.3, 'review'],
    [true, 0.5, 'invoice'],
    [false, 0.5, 'rejected'],
    [true, 0.49, 'review'],
  ] as const)('(%s, %s) -> %s', (isInvoice, confidence, expected) => {
    expect(decide(isInvoice, confidence, 0.5)).toBe(expected);
  });
});

describe('sanitizeSupplier', () => {
  it('drops a supplier containing an owner business name', () => {
    expect(sanitizeSupplier('My Own Company SAS', ['my own company'])).toBeNull();
  });

  it.each(['null', 'None', ' N/A ', ''])('drops the null marker %j', (value) => {
    expect(sanitizeSupplier(value, [])).toBeNull();
  });

  it('trims and caps the length', () => {
    expect(sanitizeSupplier('  Acme SARL  ', [])).toBe('Acme SARL');
    expect(sanitizeSupplier('x'.repeat(100), [])).toHaveLength(80);
  });

  it('drops non-strings', () => {
    expect(sanitizeSupplier(42, [])).toBeNull();
    expect(sanitizeSupplier(null, [])).toBeNull();
  });
});

describe('sanitizeDate', () => {
  it('accepts a strict YYYY-MM-DD date', () => {
    expect(sanitizeDate('2025-03-15')).toBe('2025-03-15');
  });

  it.each(['15/03/2025', 'null', '2025-3-15', '2025-03-15T10:00:00Z', 20250315])('rejects %j', (value) => {
    expect(sanitizeDate(value)).toBeNull();
  });
});

describe('sanitizeAmount', () => {
  it('keeps finite numbers, including negatives', () => {
    expect(sanitizeAmount(120.5)).toBe(120.5);
    expect(sanitizeAmount(-45)).toBe(-45);
    expect(sanitizeAmount(0)).toBe(0);
  });

  it('parses numeric strings with a decimal comma', () => {
    expect(sanitizeAmount('1234,56')).toBe(1234.56);
    expect(sanitizeAmount(' -12.50 ')).toBe(-12.5);
  });

  it.each([Number.NaN, Number.POSITIVE_INFINITY, 'Infinity', 'NaN', '', '12 EUR', true, null])('rejects %j', (value) => {
    expect(sanitizeAmount(value)).toBeNull();
  });
});

describe('sanitizeCurrency', () => {
  it('uppercases and caps', () => {
    expect(sanitizeCurrency(' eur ')).toBe('EUR');
    expect(sanitizeCurrency('abcdefghijk')).toBe('ABCDEFGH');
  });

  it('drops null markers and non-strings', () => {
    expect(sanitizeCurrency('null')).toBeNull();
    expect(sanitizeCurrency(undefined)).toBeNull();
  });
});

describe('extractJsonObject', () => {
  it('strips markdown fences', () => {
    expect(extractJsonObject('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('cuts prose around the object', () => {
    expect(extractJsonObject('Here you go: {"a":1} Thanks')).toBe('{"a":1}');
  });
});

describe('interpretModelResponse', () => {
  it('builds a full verdict from a well-formed response', () => {
    const raw = JSON.stringify({
      is_invoice: true,
      confidence: 0.92,
      reason: 'Invoice from Acme',
      invoice_date: '2025-03-15',
      supplier: 'Acme SARL',
      amount_pretax: 100,
      amount_tax: 20,
      amount_total: 120,
      currency: 'eur',
    });

    expect(interpretModelResponse(raw, options)).toEqual({
      decision: 'invoice',
      confidence: 0.92,
      reason: 'Invoice from Acme',
      invoiceDate: '2025-03-15',
      supplierName: 'Acme SARL',
      amountPretax: 100,
      amountTax: 20,
      amountTotal: 120,
      currency: 'EUR',
    });
  });

  it('leaves absent currency absent', () => {
    const raw = '{"is_invoice": true, "confidence": 0.8, "currency": null}';

    expect(interpretModelResponse(raw, options).currency).toBeNull();
  });

  it('sanitizes each field independently', () => {
    const raw = JSON.stringify({
      is_invoice: true,
      confidence: 0.7,
      invoice_date: '15/03/2025',
      supplier: 'My Own Company SAS',
      amount_total: 'abc',
      amount_tax: '4,20',
    });

    expect(interpretModelResponse(raw, options)).toMatchObject({
      decision: 'invoice',
      invoiceDate: null,
      supplierName: null,
      amountTotal: null,
      amountTax: 4.2,
    });
  });

  it('maps malformed JSON to review with confidence 0', () => {
    const verdict = interpretModelResponse('{"is_invoice": tru', options);

    expect(verdict.decision).toBe('review');
    expect(verdict.confidence).toBe(0);
  });

  it('maps missing required keys to review with confidence 0', () => {
    const verdict = interpretModelResponse('{"confidence": 0.99, "supplier": "Acme"}', options);

    expect(verdict).toMatchObject({ decision: 'review', confidence: 0, supplierName: null });
    expect(verdict.reason).toBe('malformed model response: is_invoice');
  });

  it('treats a string is_invoice as malformed', () => {
    expect(interpretModelResponse('{"is_invoice": "yes", "confidence": 0.9}', options).decision).toBe('review');
  });

  it('keeps a confident verdict when the reason is not a string', () => {
    expect(interpretModelResponse('{"is_invoice": true, "confidence": 0.9, "reason": 42}', options)).toMatchObject({
      decision: 'invoice',
      confidence: 0.9,
      reason: '42',
    });
    expect(
      interpretModelResponse('{"is_invoice": false, "confidence": 0.8, "reason": {"why": "ad"}}', options),
    ).toMatchObject({ decision: 'rejected', confidence: 0.8, reason: '' });
  });

  it('clamps confidence into [0, 1]', () => {
    expect(interpretModelResponse('{"is_invoice": false, "confidence": 7}', options)).toMatchObject({
      decision: 'rejected',
      confidence: 1,
    });
  });

  it('accepts a fenced response', () => {
    const raw = '```json\n{"is_invoice": false, "confidence": 0.95, "reason": "Newsletter"}\n```';

    expect(interpretModelResponse(raw, options)).toMatchObject({ decision: 'rejected', reason: 'Newsletter' });
  });
});
