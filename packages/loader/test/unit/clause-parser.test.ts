import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { loadClauseDocument, parseClauseDocument } from '../../src/grammar/clause-parser.js';
import type { ClauseBlock, ClauseField, ClauseNode } from '../../src/grammar/clause-parser.js';
import { tokenizeClauseText } from '../../src/grammar/clause-tokenizer.js';
import { assertMapLoadError } from '../helpers/error-assertions.js';
import { withTempDir, writeTextFile } from '../helpers/fixture-files.js';

function fieldAt(block: ClauseBlock, index: number): ClauseField {
  const item = block.items[index];
  if (item === undefined || item.kind !== 'field') {
    throw new assert.AssertionError({ message: `Expected a field at ${index}` });
  }
  return item;
}

/** Plain projection of a node: scalars become their text, blocks arrays or objects. */
function project(node: ClauseNode): unknown {
  if (node.kind === 'scalar') {
    return node.text;
  }
  return node.items.map((item) => (item.kind === 'field' ? { [item.key]: project(item.value) } : project(item.value)));
}

describe('tokenizeClauseText', () => {
  it('separates bare scalars from operators without whitespace', () => {
    const tokens = tokenizeClauseText('a=1 b>=2 c?=yes d!=no');
    assert.deepEqual(
      tokens.map((token) => (token.kind === 'scalar' ? token.text : token.kind === 'operator' ? token.operator : token.kind)),
      ['a', '=', '1', 'b', '>=', '2', 'c', '?=', 'yes', 'd', '!=', 'no'],
    );
  });

  it('rejects a lone exclamation mark', () => {
    assertMapLoadError(() => tokenizeClauseText('a ! b'), 'CLAUSE_SYNTAX_INVALID', 'Expected "=" after "!".');
  });
});

describe('parseClauseDocument', () => {
  it('reads fields, lists and nested blocks', () => {
    const document = parseClauseDocument('id = 12\nprovinces = { 1 2 3 }\nhistory = { owner = TST }\n');
    assert.deepEqual(project(document), [{ id: '12' }, { provinces: ['1', '2', '3'] }, { history: [{ owner: 'TST' }] }]);
    assert.equal(fieldAt(document, 1).line, 2);
    assert.equal(document.line, 1);
  });

  it('keeps the operator of each field', () => {
    const document = parseClauseDocument('level >= 3\nflag ?= yes');
    assert.equal(fieldAt(document, 0).operator, '>=');
    assert.equal(fieldAt(document, 1).operator, '?=');
  });

  it('unescapes quoted strings and marks them as quoted', () => {
    const value = fieldAt(parseClauseDocument('name = "New \\"Harbor\\" \\\\ 2"'), 0).value;
    assert.deepEqual(value, { kind: 'scalar', text: 'New "Harbor" \\ 2', quoted: true, line: 1 });
  });

  it('skips comments and counts lines across them', () => {
    const document = parseClauseDocument('a = 1 # note\n# full line\nb = "x # not a comment"');
    assert.deepEqual(project(document), [{ a: '1' }, { b: 'x # not a comment' }]);
    assert.equal(fieldAt(document, 1).line, 3);
  });

  it('counts lines inside multi-line quoted strings', () => {
    const document = parseClauseDocument('a = "one\ntwo"\nb = 2');
    assert.equal(fieldAt(document, 1).line, 3);
  });

  it('tags color blocks but not quoted tag names', () => {
    const tagged = fieldAt(parseClauseDocument('color = rgb { 1 2 3 }'), 0).value;
    assert.equal(tagged.kind === 'block' ? tagged.tag : undefined, 'rgb');
    assert.deepEqual(project(tagged), ['1', '2', '3']);

    const quoted = fieldAt(parseClauseDocument('color = "rgb"'), 0).value;
    assert.equal(quoted.kind, 'scalar');
  });

  it('accepts mixed fields and elements inside a block', () => {
    assert.deepEqual(project(parseClauseDocument('mixed = { a = 1 2 { 3 } }')), [{ mixed: [{ a: '1' }, '2', ['3']] }]);
  });

  it('reports syntax errors with their line', () => {
    const unclosed = assertMapLoadError(
      () => parseClauseDocument('a = {\n  b = 1\n'),
      'CLAUSE_SYNTAX_INVALID',
      'Block is never closed.',
    );
    assert.equal(unclosed.context.line, 1);
    assertMapLoadError(() => parseClauseDocument('a = 1 }'), 'CLAUSE_SYNTAX_INVALID', 'Unexpected "}".');
    assertMapLoadError(() => parseClauseDocument('= 1'), 'CLAUSE_SYNTAX_INVALID', 'Unexpected operator "=".');
    assertMapLoadError(() => parseClauseDocument('{ a }'), 'CLAUSE_SYNTAX_INVALID', 'Expected a key at the top level.');
    const bare = assertMapLoadError(() => parseClauseDocument('a = 1\nb'), 'CLAUSE_SYNTAX_INVALID', 'Expected "=" after "b".');
    assert.equal(bare.context.line, 2);
    assertMapLoadError(() => parseClauseDocument('a ='), 'CLAUSE_SYNTAX_INVALID', 'Missing value for "a".');
    assertMapLoadError(() => parseClauseDocument('a = { b = }'), 'CLAUSE_SYNTAX_INVALID', 'Missing value for "b".');
    assertMapLoadError(() => parseClauseDocument('a = "open'), 'CLAUSE_SYNTAX_INVALID', 'Unterminated quoted string.');
  });
});

describe('loadClauseDocument', () => {
  it('decodes single-byte text and drops a leading byte order mark', () => {
    withTempDir((dir) => {
      const path = writeTextFile(
        dir,
        'names.txt',
        new Uint8Array([0xef, 0xbb, 0xbf, ...Buffer.from('name = "Caf'), 0xe9, 0x22, 0x0a]),
      );
      assert.deepEqual(project(loadClauseDocument(path)), [{ name: 'Café' }]);
    });
  });

  it('prefixes syntax errors with the file and line', () => {
    withTempDir((dir) => {
      const path = writeTextFile(dir, 'broken.txt', 'a = 1\nb = {\n');
      assertMapLoadError(() => loadClauseDocument(path), 'CLAUSE_SYNTAX_INVALID', `${path}:2: Block is never closed.`);
    });
  });

  it('reports a missing file', () => {
    withTempDir((dir) => {
      const error = assertMapLoadError(() => loadClauseDocument(`${dir}/absent.txt`), 'FILE_NOT_FOUND');
      assert.equal(error.context.filePath, `${dir}/absent.txt`);
    });
  });
});
