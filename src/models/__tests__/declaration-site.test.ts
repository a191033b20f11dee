/**
 * declaration-site.test.ts
 *
 * Tests for site helpers and small model guards.
 */

import { describeSite, sameMember, sameSite, siteShape } from '../declaration-site.js';
import { isHttpVerb } from '../openapi.js';
import { inferenceRequested, isInferenceRequested, normalizePath, operationKey } from '../payloads.js';

class Invoice {}

describe('declaration sites', () => {
  it('classifies the four site shapes', () => {
    expect(siteShape({ target: Invoice })).toBe('class');
    expect(siteShape({ target: Invoice, member: 'total' })).toBe('member');
    expect(siteShape({ target: Invoice, index: 1 })).toBe('constructor-parameter');
    expect(siteShape({ target: Invoice, member: 'pay', index: 0 })).toBe('method-parameter');
  });

  it('describes sites for messages', () => {
    expect(describeSite({ target: Invoice })).toBe('Invoice');
    expect(describeSite({ target: Invoice, member: 'pay' })).toBe('Invoice.prototype.pay');
    expect(describeSite({ target: Invoice, member: 'pay', index: 2 })).toBe('Invoice.prototype.pay[2]');
    expect(describeSite({ target: Invoice, index: 1 })).toBe('Invoice.constructor[1]');
    expect(describeSite({ target: Invoice, member: 'create', isStatic: true })).toBe('Invoice.create');
    expect(describeSite({ target: Invoice, member: Symbol('secret') })).toBe('Invoice.prototype.Symbol(secret)');
  });

  it('compares sites by class, member, static flag and index', () => {
    const pay = { target: Invoice, member: 'pay' };
    expect(sameSite(pay, { target: Invoice, member: 'pay' })).toBe(true);
    expect(sameSite(pay, { target: Invoice, member: 'pay', isStatic: true })).toBe(false);
    expect(sameSite({ ...pay, index: 0 }, { ...pay, index: 1 })).toBe(false);
    expect(sameMember({ ...pay, index: 0 }, { ...pay, index: 1 })).toBe(true);
  });
});

describe('model guards', () => {
  it('recognises HTTP verbs', () => {
    expect(isHttpVerb('patch')).toBe(true);
    expect(isHttpVerb('trace')).toBe(false);
  });

  it('recognises the inference sentinel', () => {
    expect(isInferenceRequested(inferenceRequested('Invoice'))).toBe(true);
    expect(isInferenceRequested({ 'application/json': {} })).toBe(false);
    expect(isInferenceRequested(null)).toBe(false);
  });

  it('builds operation keys', () => {
    expect(operationKey('get', '/invoices/{id}')).toBe('get /invoices/{id}');
    expect(operationKey('get', 'invoices/{id}/')).toBe('get /invoices/{id}');
  });

  it('normalizes paths', () => {
    expect(normalizePath('')).toBe('/');
    expect(normalizePath('/')).toBe('/');
    expect(normalizePath('{id}')).toBe('/{id}');
    expect(normalizePath('/a/b//')).toBe('/a/b');
  });
});
