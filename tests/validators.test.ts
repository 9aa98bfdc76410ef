import { describe, it, expect } from 'vitest';

import {
  parsePrice,
  validateCategory,
  validateConfirmation,
  validateDescription,
  validateFreeText,
  validateId,
  validatePhone,
  validateTitle,
} from '../src/features/validators.js';
import { categoryLabel, findCategory } from '../src/features/catalog.js';
import { TEST_SETTINGS, media, selection, text } from './helpers/engine.js';

describe('Price parsing', () => {
  it('accepts plain and formatted amounts', () => {
    expect(parsePrice('49.99', TEST_SETTINGS)).toEqual({ ok: true, value: 49.99 });
    expect(parsePrice('$1,250', TEST_SETTINGS)).toEqual({ ok: true, value: 1250 });
    expect(parsePrice('1 000', TEST_SETTINGS)).toEqual({ ok: true, value: 1000 });
  });

  it('rounds to cents', () => {
    expect(parsePrice('3.14159', TEST_SETTINGS)).toEqual({ ok: true, value: 3.14 });
  });

  it('rejects negative and zero prices', () => {
    expect(parsePrice('-5', TEST_SETTINGS)).toEqual({ ok: false, error: 'The price must be a positive number.' });
    expect(parsePrice('0', TEST_SETTINGS)).toEqual({ ok: false, error: 'The price must be a positive number.' });
  });

  it('rejects non-numbers', () => {
    expect(parsePrice('cheap', TEST_SETTINGS)).toEqual({ ok: false, error: 'Please enter a valid number for the price.' });
    expect(parsePrice('1e5', TEST_SETTINGS).ok).toBe(false);
  });

  it('rejects prices above the maximum', () => {
    expect(parsePrice('2000000', TEST_SETTINGS)).toEqual({ ok: false, error: 'The price cannot exceed $1,000,000.' });
  });
});

describe('Field validators', () => {
  it('trims titles and enforces their length', () => {
    expect(validateTitle(text('  Bike  '), TEST_SETTINGS)).toEqual({ ok: true, value: 'Bike' });
    expect(validateTitle(text('ab'), TEST_SETTINGS)).toEqual({ ok: false, error: 'The title must be at least 3 characters.' });
    expect(validateTitle(text('x'.repeat(101)), TEST_SETTINGS)).toEqual({ ok: false, error: 'The title cannot exceed 100 characters.' });
    expect(validateTitle(media('1'), TEST_SETTINGS)).toEqual({ ok: false, error: 'The title cannot be empty.' });
  });

  it('requires descriptions to be text', () => {
    expect(validateDescription(text(' Barely used '), TEST_SETTINGS)).toEqual({ ok: true, value: 'Barely used' });
    expect(validateDescription(media('1'), TEST_SETTINGS)).toEqual({ ok: false, error: 'Please send the description as text.' });
  });

  it('accepts categories as selections or text', () => {
    expect(validateCategory(selection('category:Electronics'))).toEqual({ ok: true, value: 'electronics' });
    expect(validateCategory(text('Books'))).toEqual({ ok: true, value: 'books' });
    expect(validateCategory(text('cars'))).toEqual({ ok: false, error: 'Please choose one of the listed categories.' });
  });

  it('accepts "all" only where allowed', () => {
    expect(validateCategory(selection('category:all'), { allowAll: true })).toEqual({ ok: true, value: 'all' });
    expect(validateCategory(selection('category:all')).ok).toBe(false);
  });

  it('reads ids from text and selections', () => {
    expect(validateId(text('#12'), 'listing')).toEqual({ ok: true, value: 12 });
    expect(validateId(selection('pick:7'), 'user')).toEqual({ ok: true, value: 7 });
    expect(validateId(text('twelve'), 'listing')).toEqual({ ok: false, error: 'Please send a valid listing id (a positive number).' });
  });

  it('bounds free text', () => {
    expect(validateFreeText(text('no'), 'reason', { min: 3, max: 10 })).toEqual({
      ok: false,
      error: 'The reason must be at least 3 characters.',
    });
    expect(validateFreeText(text('   '), 'location', { max: 10 })).toEqual({ ok: false, error: 'The location cannot be empty.' });
    expect(validateFreeText(text('x'.repeat(11)), 'bio', { max: 10 })).toEqual({ ok: false, error: 'The bio cannot exceed 10 characters.' });
  });

  it('validates phone numbers', () => {
    expect(validatePhone(text('+1 (555) 010-0000'))).toEqual({ ok: true, value: '+1 (555) 010-0000' });
    expect(validatePhone(text('call me')).ok).toBe(false);
  });

  it('reads confirmations from text and selections', () => {
    expect(validateConfirmation(selection('confirm:yes'))).toEqual({ ok: true, value: true });
    expect(validateConfirmation(text('NO'))).toEqual({ ok: true, value: false });
    expect(validateConfirmation(text('y'))).toEqual({ ok: true, value: true });
    expect(validateConfirmation(text('maybe'))).toEqual({ ok: false, error: 'Please answer yes or no.' });
  });
});

describe('Catalog', () => {
  it('labels known categories and passes unknown ids through', () => {
    expect(findCategory('pets')?.name).toBe('Pets');
    expect(categoryLabel('electronics')).toBe('📱 Electronics');
    expect(categoryLabel('spaceships')).toBe('spaceships');
  });
});
