import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { z } from 'zod';
import { wrapTool, type ToolImplementation } from '../../../src/tools/tool-wrapper';
import { Success } from '../../../src/domain/types';
import { ErrorCodes, NotLoggedInError, ValidationError } from '../../../src/lib/errors';
import {
  createTestContext,
  type TestContext,
} from '../../__support__/utilities/mock-infrastructure';

const schema = z.object({
  count: z.number().int(),
  label: z.string().default('none'),
});

type Params = z.output<typeof schema>;

describe('wrapTool', () => {
  let test: TestContext;

  beforeEach(async () => {
    test = await createTestContext();
  });

  afterEach(async () => {
    await test.cleanup();
  });

  it('should pass parsed parameters with defaults to the implementation', async () => {
    const implementation = jest.fn<ToolImplementation<Params, string>>(async (params) =>
      Success(`${params.label}:${params.count}`),
    );
    const tool = wrapTool('demo', schema, implementation);

    const result = await tool({ count: 3 }, test.context);

    expect(result).toEqual({ ok: true, value: 'none:3' });
    expect(implementation.mock.calls[0]?.[0]).toEqual({ count: 3, label: 'none' });
  });

  it('should reject invalid parameters without running the implementation', async () => {
    const implementation = jest.fn<ToolImplementation<Params, string>>(async () => Success('x'));
    const tool = wrapTool('demo', schema, implementation);

    const result = await tool({ count: 1.5 }, test.context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe(
        'invalid demo options: count: Expected integer, received float',
      );
    }
    expect(implementation).not.toHaveBeenCalled();
  });

  it('should turn a thrown typed error into a failure as is', async () => {
    const error = new NotLoggedInError();
    const tool = wrapTool('demo', schema, async () => {
      throw error;
    });

    const result = await tool({ count: 1 }, test.context);

    expect(result).toEqual({ ok: false, error });
  });

  it('should wrap unexpected exceptions as internal errors', async () => {
    const tool = wrapTool('demo', schema, async () => {
      throw new TypeError('cannot read properties of undefined');
    });

    const result = await tool({ count: 1 }, test.context);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCodes.INTERNAL_ERROR);
      expect(result.error.message).toBe('cannot read properties of undefined');
    }
  });
});
