/**
 * Copyright 2025 GoodRx, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { withLogContext } from '../context';

const mockChild = jest.fn().mockReturnValue({
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
});

jest.mock('../rootLogger', () => ({
  __esModule: true,
  default: {
    child: (...args: unknown[]) => mockChild(...args),
  },
}));

import { getLogger } from '../contextLogger';

describe('contextLogger', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('getLogger', () => {
    it('should pass AsyncLocalStorage context to logger.child()', async () => {
      await withLogContext({ correlationId: 'test-corr-id', sessionId: 'session-1', round: 3 }, async () => {
        getLogger();

        expect(mockChild).toHaveBeenCalledWith({
          correlationId: 'test-corr-id',
          sessionId: 'session-1',
          round: 3,
        });
      });
    });

    it('should merge extra params with async context', async () => {
      await withLogContext({ correlationId: 'test-corr-id' }, async () => {
        getLogger({ component: 'ToolDispatcher' });

        expect(mockChild).toHaveBeenCalledWith({
          correlationId: 'test-corr-id',
          component: 'ToolDispatcher',
        });
      });
    });

    it('should drop undefined values outside any context', () => {
      getLogger();
      expect(mockChild).toHaveBeenCalledWith({});
    });
  });
});
