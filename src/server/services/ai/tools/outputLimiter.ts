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

export const DEFAULT_MAX_CHARS = 30000;
const MARKER_RESERVE = 200;

function makeMarker(kept: number, total: number): string {
  return `\n[Truncated: showing ${kept} of ${total} chars, ${total - kept} omitted. Use tighter filters to get specific data]`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(s: string): unknown {
  const trimmed = s.trimStart();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return undefined;
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

/** Cuts text to at most maxChars, marker included. */
function cutWithMarker(content: string, maxChars: number): string {
  // size the marker for the worst case so the kept count it reports is exact
  const reserve = makeMarker(maxChars, content.length).length;
  if (reserve >= maxChars) return content.slice(0, maxChars);
  const kept = maxChars - reserve;
  return content.slice(0, kept) + makeMarker(kept, content.length);
}

export class OutputLimiter {
  static truncate(content: string, maxChars: number = DEFAULT_MAX_CHARS): string {
    if (content.length <= maxChars) return content;

    const parsed = parseJson(content);
    if (isRecord(parsed)) {
      return OutputLimiter.truncateJsonObject(parsed, maxChars);
    }

    return cutWithMarker(content, maxChars);
  }

  private static truncateJsonObject(obj: Record<string, unknown>, maxChars: number): string {
    const fields = Object.keys(obj).map((key) => ({
      key,
      size: JSON.stringify(obj[key]).length,
    }));
    fields.sort((a, b) => b.size - a.size);

    const result = { ...obj };
    let serialized = JSON.stringify(result);

    for (const field of fields) {
      if (serialized.length <= maxChars) break;
      const val = result[field.key];
      if (typeof val === 'string' && val.length > 200) {
        const overage = serialized.length - maxChars;
        const targetLen = Math.max(100, val.length - overage - MARKER_RESERVE);
        result[field.key] = val.slice(0, targetLen) + makeMarker(targetLen, val.length);
        serialized = JSON.stringify(result);
      } else if (Array.isArray(val) && val.length > 5) {
        result[field.key] = [...val.slice(0, 3), { _truncated: `${val.length - 5} items omitted` }, ...val.slice(-2)];
        serialized = JSON.stringify(result);
      }
    }

    if (serialized.length > maxChars) {
      return cutWithMarker(serialized, maxChars);
    }

    return serialized;
  }

  /** Keeps the first and last lines of a log, where the useful context usually is. */
  static truncateLogOutput(
    content: string,
    maxChars: number = DEFAULT_MAX_CHARS,
    headLines: number = 50,
    tailLines: number = 100
  ): string {
    const lines = content.split('\n');
    if (lines.length <= headLines + tailLines) {
      return OutputLimiter.truncate(content, maxChars);
    }

    const head = lines.slice(0, headLines);
    const tail = lines.slice(-tailLines);
    const omitted = lines.length - headLines - tailLines;
    const marker = `\n... [Truncated: ${omitted} lines omitted of ${lines.length} total] ...\n`;
    const result = head.join('\n') + marker + tail.join('\n');

    if (result.length > maxChars) {
      return cutWithMarker(result, maxChars);
    }
    return result;
  }

  static truncateJsonSafely(jsonString: string, maxChars: number = DEFAULT_MAX_CHARS): string {
    if (jsonString.length <= maxChars) return jsonString;

    const parsed = parseJson(jsonString);
    if (parsed === undefined || parsed === null || typeof parsed !== 'object') {
      return OutputLimiter.truncate(jsonString, maxChars);
    }

    const serialized = JSON.stringify(OutputLimiter.walkAndTruncate(parsed, maxChars));
    if (serialized.length > maxChars) {
      return OutputLimiter.truncate(serialized, maxChars);
    }
    return serialized;
  }

  private static walkAndTruncate(obj: unknown, budget: number): unknown {
    if (typeof obj === 'string') {
      if (obj.length > 1000) {
        return obj.slice(0, 500) + makeMarker(500, obj.length);
      }
      return obj;
    }

    if (Array.isArray(obj)) {
      if (obj.length > 5 && JSON.stringify(obj).length > budget) {
        const first3 = obj.slice(0, 3).map((item) => OutputLimiter.walkAndTruncate(item, budget));
        const last2 = obj.slice(-2).map((item) => OutputLimiter.walkAndTruncate(item, budget));
        return [...first3, { _truncated: `${obj.length - 5} items omitted` }, ...last2];
      }
      return obj.map((item) => OutputLimiter.walkAndTruncate(item, budget));
    }

    if (isRecord(obj)) {
      const result: Record<string, unknown> = {};
      for (const [key, val] of Object.entries(obj)) {
        result[key] = OutputLimiter.walkAndTruncate(val, budget);
      }
      return result;
    }

    return obj;
  }
}
