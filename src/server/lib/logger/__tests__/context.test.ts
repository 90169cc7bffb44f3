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

import { getLogContext, withLogContext, updateLogContext } from '../context';

describe('Logger Context', () => {
  describe('getLogContext', () => {
    it('should return empty object when no context is set', () => {
      expect(getLogContext()).toEqual({});
    });
  });

  describe('withLogContext', () => {
    it('should set context and make it available inside the callback', async () => {
      await withLogContext({ correlationId: 'test-correlation-id' }, async () => {
        expect(getLogContext().correlationId).toBe('test-correlation-id');
      });
    });

    it('should merge parent context with new context', async () => {
      await withLogContext({ correlationId: 'parent-id' }, async () => {
        await withLogContext({ sessionId: 'session-1' }, async () => {
          const context = getLogContext();
          expect(context.correlationId).toBe('parent-id');
          expect(context.sessionId).toBe('session-1');
        });
      });
    });

    it('should use child correlationId if provided', async () => {
      await withLogContext({ correlationId: 'parent-id' }, async () => {
        await withLogContext({ correlationId: 'child-id' }, async () => {
          expect(getLogContext().correlationId).toBe('child-id');
        });
      });
    });

    it('should default to "unknown" correlationId if none provided', () => {
      withLogContext({}, () => {
        expect(getLogContext().correlationId).toBe('unknown');
      });
    });

    it('should return the callback result for synchronous functions', () => {
      const result = withLogContext({ correlationId: 'sync-test' }, () => 'sync-result');
      expect(result).toBe('sync-result');
    });
  });

  describe('updateLogContext', () => {
    it('should update the active context in place', () => {
      withLogContext({ correlationId: 'round-test', round: 1 }, () => {
        updateLogContext({ round: 2 });
        expect(getLogContext().round).toBe(2);
      });
    });

    it('should be a no-op outside a context', () => {
      updateLogContext({ round: 5 });
      expect(getLogContext()).toEqual({});
    });
  });
});
