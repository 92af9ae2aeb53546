import type { Book, Item, Magazine, Member } from './types';
import { IssueNumberParseError, UnknownItemTypeError } from './errors';

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

export const book = (title: string, author: string): Book =>
  Object.freeze({ type: 'Book', title, author });

export const magazine = (title: string, issueNumber: number): Magazine =>
  Object.freeze({ type: 'Magazine', title, issueNumber });

export const member = (name: string): Member => Object.freeze({ name });

/**
 * Parse a magazine issue number: optional sign, decimal digits, surrounding
 * whitespace ignored, value within signed 32-bit range.
 */
export function parseIssueNumber(text: string): number {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) throw new IssueNumberParseError(text);
  const n = Number(trimmed);
  if (n < INT32_MIN || n > INT32_MAX) throw new IssueNumberParseError(text);
  // Number('-0') is -0
  return n === 0 ? 0 : n;
}

/**
 * Build a catalog item from a lower-case type tag and two text fields.
 * The second field is the author for books and the issue number for magazines.
 */
export function createItem(type: string, title: string, authorOrIssue: string): Item {
  switch (type) {
    case 'book':
      return book(title, authorOrIssue);
    case 'magazine':
      return magazine(title, parseIssueNumber(authorOrIssue));
    default:
      throw new UnknownItemTypeError(type);
  }
}

export function describeItem(item: Item): string {
  switch (item.type) {
    case 'Book':
      return `Book: ${item.title} by ${item.author}`;
    case 'Magazine':
      return `Magazine: ${item.title} Issue: ${item.issueNumber}`;
    default: {
      const _exhaustive: never = item;
      return _exhaustive;
    }
  }
}

export const describeMember = (m: Member): string => `Member: ${m.name}`;
