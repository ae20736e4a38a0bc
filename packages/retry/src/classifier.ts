/**
 * Fault classifiers: predicates over a fault's kind and detail
 */

import { getErrorCode } from '@brokerlink/errors';

import type { FaultClassifier } from './types.js';

type ErrorType<T extends Error> = abstract new (...args: never[]) => T;

export const Classifiers = {
  /**
   * Faults that are instances of `type` and, when given, satisfy `when`
   */
  ofType<T extends Error>(
    type: ErrorType<T>,
    when?: (fault: T) => boolean,
    description: string = type.name
  ): FaultClassifier {
    return {
      description,
      matches: (fault: unknown): boolean =>
        fault instanceof type && (when === undefined || when(fault)),
    };
  },

  /**
   * Faults of `type` whose message contains `text`
   */
  messageContains<T extends Error>(type: ErrorType<T>, text: string): FaultClassifier {
    return Classifiers.ofType(
      type,
      fault => fault.message.includes(text),
      `${type.name} with "${text}"`
    );
  },

  /**
   * Node system errors carrying one of the given `code`s
   */
  withCode(...codes: string[]): FaultClassifier {
    const accepted = new Set(codes);
    return {
      description: `code in [${codes.join(', ')}]`,
      matches: (fault: unknown): boolean => {
        const code = getErrorCode(fault);
        return code !== undefined && accepted.has(code);
      },
    };
  },

  /**
   * Faults matched by at least one of `classifiers`
   */
  any(...classifiers: FaultClassifier[]): FaultClassifier {
    return {
      description: classifiers.map(c => c.description).join(' | '),
      matches: (fault: unknown): boolean => classifiers.some(c => c.matches(fault)),
    };
  },
} as const;
