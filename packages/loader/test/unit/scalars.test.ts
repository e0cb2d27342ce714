import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  colorKey,
  colorsEqual,
  dayMonthsEqual,
  formatDayMonth,
  formatGameDate,
  gameDatesEqual,
  parseAssetPath,
  parseClauseBoolean,
  parseDayMonth,
  parseDelimitedBoolean,
  parseFiniteFloat,
  parseGameDate,
  parseI32,
  parseProvinceId,
  parseU8,
} from '../../src/kernel/scalars.js';
import { asBlue, asGreen, asRed } from '../../src/kernel/branded.js';
import { assertMapLoadError } from '../helpers/error-assertions.js';

describe('integer scalars', () => {
  it('accepts signed decimal literals within range', () => {
    assert.equal(parseI32('42'), 42);
    assert.equal(parseI32('-7'), -7);
    assert.equal(parseI32('+5'), 5);
    assert.equal(parseI32('-2147483648'), -2_147_483_648);
  });

  it('rejects fractions and out-of-range values with the label in the message', () => {
    assertMapLoadError(() => parseI32('4.5'), 'SCALAR_FORMAT_INVALID', 'Invalid integer "4.5": expected an integer literal.');
    assertMapLoadError(
      () => parseI32('2147483648'),
      'SCALAR_FORMAT_INVALID',
      'Invalid integer "2147483648": expected a value <= 2147483647.',
    );
    assertMapLoadError(
      () => parseU8('256', 'red channel'),
      'SCALAR_FORMAT_INVALID',
      'Invalid red channel "256": expected a value <= 255.',
    );
    assertMapLoadError(() => parseU8('-1'), 'SCALAR_FORMAT_INVALID', 'Invalid byte "-1": expected an integer literal.');
  });

  it('names the id kind for branded parsers', () => {
    assert.equal(parseProvinceId('15116'), 15116);
    const error = assertMapLoadError(
      () => parseProvinceId('x12'),
      'SCALAR_FORMAT_INVALID',
      'Invalid province id "x12": expected an integer literal.',
    );
    assert.equal(error.category, 'format');
  });
});

describe('float scalars', () => {
  it('accepts the decimal forms found in map files', () => {
    assert.equal(parseFiniteFloat('0.5'), 0.5);
    assert.equal(parseFiniteFloat('.5'), 0.5);
    assert.equal(parseFiniteFloat('-3.'), -3);
    assert.equal(parseFiniteFloat('1.5e2'), 150);
  });

  it('rejects non-numeric and non-finite text', () => {
    assertMapLoadError(() => parseFiniteFloat('abc'), 'SCALAR_FORMAT_INVALID', 'Invalid number "abc": expected a decimal literal.');
    assertMapLoadError(() => parseFiniteFloat('1e400'), 'SCALAR_FORMAT_INVALID', 'Invalid number "1e400": expected a finite value.');
  });
});

describe('boolean scalars', () => {
  it('reads yes/no in clause files and true/false in delimited files', () => {
    assert.equal(parseClauseBoolean('yes'), true);
    assert.equal(parseClauseBoolean('no'), false);
    assert.equal(parseDelimitedBoolean('true'), true);
    assert.equal(parseDelimitedBoolean('false'), false);
  });

  it('does not accept the other file kind spelling', () => {
    assertMapLoadError(() => parseClauseBoolean('true'), 'SCALAR_FORMAT_INVALID', 'Invalid boolean "true": expected yes or no.');
    assertMapLoadError(
      () => parseDelimitedBoolean('yes'),
      'SCALAR_FORMAT_INVALID',
      'Invalid boolean "yes": expected true or false.',
    );
  });
});

describe('dates', () => {
  it('parses zero-based day-month pairs', () => {
    assert.deepEqual(parseDayMonth('0.0'), { day: 0, month: 0 });
    assert.deepEqual(parseDayMonth('30.11'), { day: 30, month: 11 });
    assert.equal(formatDayMonth(parseDayMonth('14.6')), '14.6');
  });

  it('compares day-month values by day and month', () => {
    assert.equal(dayMonthsEqual(parseDayMonth('0.10'), parseDayMonth('0.10')), true);
    assert.equal(dayMonthsEqual(parseDayMonth('0.10'), { day: 0, month: 10 }), true);
    assert.equal(dayMonthsEqual(parseDayMonth('0.1'), parseDayMonth('0.10')), false);
    assert.equal(dayMonthsEqual(parseDayMonth('1.10'), parseDayMonth('0.10')), false);
  });

  it('rejects day-month values past the calendar', () => {
    assertMapLoadError(() => parseDayMonth('31.0'), 'SCALAR_FORMAT_INVALID', 'Invalid day-month "31.0": expected a day <= 30.');
    assertMapLoadError(() => parseDayMonth('0.12'), 'SCALAR_FORMAT_INVALID', 'Invalid day-month "0.12": expected a month <= 11.');
  });

  it('parses game dates and checks the day against the month', () => {
    assert.deepEqual(parseGameDate('1936.1.1'), { year: 1936, month: 1, day: 1 });
    assert.equal(formatGameDate(parseGameDate('0.12.31')), '0.12.31');
    assert.equal(gameDatesEqual(parseGameDate('0.2.28'), { year: 0, month: 2, day: 28 }), true);
    assertMapLoadError(
      () => parseGameDate('1936.2.29'),
      'SCALAR_FORMAT_INVALID',
      'Invalid date "1936.2.29": expected a day <= 28 in month 2.',
    );
    assertMapLoadError(() => parseGameDate('1936.1.0'), 'SCALAR_FORMAT_INVALID', 'Invalid date "1936.1.0": expected a day >= 1.');
  });
});

describe('asset paths', () => {
  it('accepts relative forward-slash paths', () => {
    assert.equal(parseAssetPath('map/definition.csv'), 'map/definition.csv');
  });

  it('rejects empty, absolute and backslash paths', () => {
    assertMapLoadError(() => parseAssetPath(''), 'SCALAR_FORMAT_INVALID', 'Invalid asset path "": expected a nonempty path.');
    assertMapLoadError(() => parseAssetPath('/map/a.txt'), 'SCALAR_FORMAT_INVALID', 'Invalid asset path "/map/a.txt": expected a relative path.');
    assertMapLoadError(() => parseAssetPath('C:/map'), 'SCALAR_FORMAT_INVALID', 'Invalid asset path "C:/map": expected a relative path.');
    assertMapLoadError(() => parseAssetPath('map\\a.txt'), 'SCALAR_FORMAT_INVALID', 'Invalid asset path "map\\a.txt": expected forward slashes.');
  });
});

describe('colorKey', () => {
  it('joins the channels', () => {
    assert.equal(colorKey({ r: asRed(1), g: asGreen(2), b: asBlue(3) }), '1,2,3');
  });
});

describe('colorsEqual', () => {
  const color = { r: asRed(10), g: asGreen(20), b: asBlue(30) };

  it('matches a copy of the same channels', () => {
    assert.equal(colorsEqual(color, { ...color }), true);
  });

  it('rejects a single differing channel', () => {
    assert.equal(colorsEqual(color, { ...color, r: asRed(11) }), false);
    assert.equal(colorsEqual(color, { ...color, g: asGreen(21) }), false);
    assert.equal(colorsEqual(color, { ...color, b: asBlue(31) }), false);
  });
});
