/**
 * Tests for caller-side body decoding.
 */

import { z } from 'zod';
import { ClientErrorCode, parseJsonBody } from '../index.js';

const tokenSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number().int(),
});

describe('parseJsonBody', () => {
  it('should return the validated value', () => {
    const result = parseJsonBody('{"access_token":"t","token_type":"Bearer","expires_in":3600}', tokenSchema);

    expect(result._unsafeUnwrap()).toEqual({ access_token: 't', token_type: 'Bearer', expires_in: 3600 });
  });

  it('should report invalid JSON', () => {
    const error = parseJsonBody('<html>', tokenSchema)._unsafeUnwrapErr();

    expect(error.code).toBe(ClientErrorCode.Serialization);
    expect(error.message.startsWith('Serialization error: Response is not valid JSON: ')).toBe(true);
  });

  it('should list the fields that do not match', () => {
    const error = parseJsonBody('{"access_token":"t","token_type":"Bearer"}', tokenSchema)._unsafeUnwrapErr();

    expect(error.message).toBe(
      'Serialization error: Response does not match the expected shape: expires_in: Required'
    );
  });

  it('should name the root when the whole value is wrong', () => {
    const error = parseJsonBody('[]', tokenSchema)._unsafeUnwrapErr();

    expect(error.message).toBe(
      'Serialization error: Response does not match the expected shape: (root): Expected object, received array'
    );
  });
});
