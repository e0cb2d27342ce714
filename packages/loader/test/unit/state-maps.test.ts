import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { loadAirports, loadStateProvinceMap, parseStateMapLine } from '../../src/components/state-maps.js';
import { assertMapLoadError } from '../helpers/error-assertions.js';
import { withTempDir, writeTextFile } from '../helpers/fixture-files.js';

describe('parseStateMapLine', () => {
  it('reads one or more entries from a line', () => {
    assert.deepEqual(parseStateMapLine('12 = { 100 101 }'), [{ stateId: 12, provinces: [100, 101] }]);
    assert.deepEqual(parseStateMapLine('1 = { 2 } 3 = { }'), [
      { stateId: 1, provinces: [2] },
      { stateId: 3, provinces: [] },
    ]);
  });
});

describe('loadStateProvinceMap', () => {
  it('lets a later line for the same state win', () => {
    withTempDir((dir) => {
      const path = writeTextFile(dir, 'airports.txt', '1 = { 10 }\n\n2 = { 20 21 }\n1 = { 11 }\n');
      assert.deepEqual([...loadAirports(path)], [
        [1, [11]],
        [2, [20, 21]],
      ]);
    });
  });

  it('wraps every line failure with the file and line', () => {
    withTempDir((dir) => {
      const badState = writeTextFile(dir, 'a.txt', '1 = { 10 }\nx = { 3 }\n');
      const error = assertMapLoadError(
        () => loadStateProvinceMap(badState),
        'STATE_MAP_LINE_INVALID',
        `${badState}:2: invalid state province line: Invalid state id "x": expected an integer literal.`,
      );
      assert.deepEqual(error.context, { filePath: badState, line: 2 });

      const badProvince = writeTextFile(dir, 'b.txt', '5 = { a }\n');
      assertMapLoadError(
        () => loadStateProvinceMap(badProvince),
        'STATE_MAP_LINE_INVALID',
        `${badProvince}:1: invalid state province line: 5[0]: Invalid province id "a": expected an integer literal.`,
      );

      const badSyntax = writeTextFile(dir, 'c.txt', '5 6\n');
      assertMapLoadError(
        () => loadStateProvinceMap(badSyntax),
        'STATE_MAP_LINE_INVALID',
        `${badSyntax}:1: invalid state province line: Expected "=" after "5".`,
      );
    });
  });
});
