import * as assert from 'node:assert/strict';
import { afterEach, describe, it, mock } from 'node:test';

import {
  ConsoleDiagnosticSink,
  createDiagnosticCollector,
  formatDiagnostic,
  reportDiagnostic,
} from '../../src/kernel/diagnostics.js';
import type { Diagnostic } from '../../src/kernel/diagnostics.js';

const warning: Diagnostic = {
  code: 'STATE_DUPLICATE',
  path: 'states.7',
  severity: 'warning',
  message: 'State 7 is declared by more than one file; 7-B.txt is used.',
};

describe('formatDiagnostic', () => {
  it('formats the code, path and message', () => {
    assert.equal(
      formatDiagnostic(warning),
      '[warning] STATE_DUPLICATE at states.7: State 7 is declared by more than one file; 7-B.txt is used.',
    );
  });

  it('adds the file location and the suggestion when present', () => {
    assert.equal(
      formatDiagnostic({
        code: 'XREF_TERRAIN_UNDECLARED',
        path: 'definitions[2].terrain',
        severity: 'warning',
        message: 'Bad terrain.',
        suggestion: 'Declare it.',
        filePath: 'definition.csv',
        line: 3,
      }),
      '[warning] XREF_TERRAIN_UNDECLARED at definitions[2].terrain (definition.csv:3): Bad terrain. Suggestion: Declare it.',
    );
  });
});

describe('createDiagnosticCollector', () => {
  it('keeps every diagnostic and forwards each one as it arrives', () => {
    const forwarded: Diagnostic[] = [];
    const collector = createDiagnosticCollector({ report: (d) => forwarded.push(d) });
    reportDiagnostic({ diagnostics: collector }, warning);
    assert.deepEqual(collector.diagnostics, [warning]);
    assert.deepEqual(forwarded, [warning]);
  });

  it('ignores reports when the context carries no sink', () => {
    assert.doesNotThrow(() => reportDiagnostic({}, warning));
  });
});

describe('ConsoleDiagnosticSink', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('routes by severity and drops anything below the threshold', () => {
    const log = mock.method(console, 'log', () => undefined);
    const warn = mock.method(console, 'warn', () => undefined);
    const error = mock.method(console, 'error', () => undefined);
    const sink = new ConsoleDiagnosticSink('atlas');

    sink.report({ ...warning, severity: 'info' });
    sink.report(warning);
    sink.report({ ...warning, severity: 'error' });

    assert.equal(log.mock.callCount(), 0);
    assert.deepEqual(
      warn.mock.calls.map((call) => call.arguments),
      [['[atlas] [warning] STATE_DUPLICATE at states.7: State 7 is declared by more than one file; 7-B.txt is used.']],
    );
    assert.equal(error.mock.callCount(), 1);
  });

  it('prints info diagnostics when asked to', () => {
    const log = mock.method(console, 'log', () => undefined);
    new ConsoleDiagnosticSink('atlas', 'info').report({ ...warning, severity: 'info', message: 'Loaded states.' });
    assert.deepEqual(
      log.mock.calls.map((call) => call.arguments),
      [['[atlas] [info] STATE_DUPLICATE at states.7: Loaded states.']],
    );
  });
});
