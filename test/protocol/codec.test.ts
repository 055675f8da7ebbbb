import { describe, it, expect } from 'vitest';
import { decodeDatagram, encodeMessage, resultOf } from '../../src/protocol/codec.js';
import { ValidationError } from '../../src/core/errors.js';

describe('encodeMessage', () => {
  it('should write compact UTF-8 JSON', () => {
    const payload = encodeMessage({ method: 'setPilot', params: { state: true, dimming: 50 } });
    expect(payload.toString('utf8')).toBe('{"method":"setPilot","params":{"state":true,"dimming":50}}');
  });

  it('should reject a message that does not fit in one datagram', () => {
    const big = 'x'.repeat(70000);
    expect(() => encodeMessage({ method: 'setPilot', params: { big } })).toThrow(ValidationError);
  });
});

describe('decodeDatagram', () => {
  const decode = (text: string) => decodeDatagram(Buffer.from(text, 'utf8'));

  it('should classify a result reply', () => {
    expect(decode('{"method":"getPilot","result":{"state":false}}')).toEqual({
      kind: 'result',
      data: { method: 'getPilot', result: { state: false } },
      text: '{"method":"getPilot","result":{"state":false}}',
    });
  });

  it('should classify an error reply', () => {
    const decoded = decode('{"error":{"code":-32601,"message":"Method not found"}}');
    expect(decoded.kind).toBe('error');
    if (decoded.kind === 'error') {
      expect(decoded.error).toEqual({ code: -32601, message: 'Method not found' });
    }
  });

  it('should keep an error reply whose error is not an object', () => {
    const decoded = decode('{"error":"busy"}');
    expect(decoded.kind).toBe('error');
    if (decoded.kind === 'error') {
      expect(decoded.error).toEqual({});
    }
  });

  it.each(['{bad', '42', '"text"', 'null', '[{"result":{}}]'])('marks %s invalid', (text) => {
    const decoded = decode(text);
    expect(decoded.kind).toBe('invalid');
    expect(decoded.text).toBe(text);
  });
});

describe('resultOf', () => {
  it('should prefer the result object', () => {
    expect(resultOf({ method: 'getPilot', result: { dimming: 10 } })).toEqual({ dimming: 10 });
  });

  it('should fall back to the reply when result is missing or not an object', () => {
    expect(resultOf({ mac: 'a8bb50000001' })).toEqual({ mac: 'a8bb50000001' });
    expect(resultOf({ result: true })).toEqual({ result: true });
  });
});
