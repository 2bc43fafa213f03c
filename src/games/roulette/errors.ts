import { describeBet } from './bet.js';
import type { ValidationError } from './types.js';

export function formatValidationError(error: ValidationError): string {
  const bet = describeBet(error.bet);
  switch (error.kind) {
    case 'InvalidGeometry':
      return `Invalid bet option: ${bet}`;
    case 'InvalidWager':
      return `Wager must be a positive whole amount: ${bet}`;
    case 'BelowMinimum':
      return `Minimum (${error.minimum}) not met for option ${bet}`;
    case 'AboveMaximum':
      return `Maximum bet of ${error.maximum} reached on option ${bet}`;
  }
}
