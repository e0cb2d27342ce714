import type { AdjacencyRuleName, ProvinceId } from '../kernel/branded.js';
import { MAP_DIAGNOSTIC_CODES } from '../kernel/diagnostic-codes.js';
import { reportDiagnostic } from '../kernel/diagnostics.js';
import type { LoadContext } from '../kernel/diagnostics.js';
import { decodeString, listOf, loadClauseFile, objectDecoder } from '../grammar/clause-decoder.js';
import type { ClauseDecoder, ClauseFieldReader } from '../grammar/clause-decoder.js';
import type { ClauseBlock } from '../grammar/clause-parser.js';
import { ClauseBlockBuilder, formatClauseDocument } from '../grammar/clause-writer.js';
import {
  decodeAdjacencyRuleName,
  decodeI32,
  decodeProvinceId,
  decodeYesNo,
  tripleOf,
} from '../grammar/scalar-decoders.js';

/** Which unit kinds may cross, for one controller relationship. */
export interface AdjacencyLogic {
  readonly army: boolean;
  readonly navy: boolean;
  readonly submarine: boolean;
  readonly trade: boolean;
}

export interface AdjacencyRuleDisablement {
  readonly tooltip: string;
}

export type AdjacencyRuleOffset = readonly [x: number, y: number, z: number];

export interface AdjacencyRule {
  readonly name: AdjacencyRuleName;
  readonly contested: AdjacencyLogic;
  readonly enemy: AdjacencyLogic;
  readonly friend: AdjacencyLogic;
  readonly neutral: AdjacencyLogic;
  readonly requiredProvinces: readonly ProvinceId[];
  readonly icon: ProvinceId;
  readonly offset: AdjacencyRuleOffset;
  readonly isDisabled?: AdjacencyRuleDisablement;
}

export type AdjacencyRules = ReadonlyMap<AdjacencyRuleName, AdjacencyRule>;

const ADJACENCY_LOGIC_KEYS = ['contested', 'enemy', 'friend', 'neutral'] as const;

export const decodeAdjacencyLogic: ClauseDecoder<AdjacencyLogic> = objectDecoder((fields) => ({
  army: fields.required('army', decodeYesNo),
  navy: fields.required('navy', decodeYesNo),
  submarine: fields.required('submarine', decodeYesNo),
  trade: fields.required('trade', decodeYesNo),
}));

const decodeDisablement: ClauseDecoder<AdjacencyRuleDisablement> = objectDecoder((fields) => ({
  tooltip: fields.required('tooltip', decodeString),
}));

export const decodeAdjacencyRule: ClauseDecoder<AdjacencyRule> = objectDecoder((fields) => {
  const isDisabled = fields.optional('is_disabled', decodeDisablement);
  return {
    name: fields.required('name', decodeAdjacencyRuleName),
    contested: fields.required('contested', decodeAdjacencyLogic),
    enemy: fields.required('enemy', decodeAdjacencyLogic),
    friend: fields.required('friend', decodeAdjacencyLogic),
    neutral: fields.required('neutral', decodeAdjacencyLogic),
    requiredProvinces: fields.required('required_provinces', listOf(decodeProvinceId)),
    icon: fields.required('icon', decodeProvinceId),
    offset: fields.required('offset', tripleOf(decodeI32)),
    ...(isDisabled === undefined ? {} : { isDisabled }),
  };
});

export const decodeAdjacencyRuleDocument = (document: ClauseFieldReader): readonly AdjacencyRule[] =>
  document.duplicated('adjacency_rule', decodeAdjacencyRule);

/** Rules keyed by name. A later rule with the same name replaces the earlier one. */
export function loadAdjacencyRules(path: string, context: LoadContext = {}): AdjacencyRules {
  const rules = new Map<AdjacencyRuleName, AdjacencyRule>();
  for (const rule of loadClauseFile(path, decodeAdjacencyRuleDocument)) {
    if (rules.has(rule.name)) {
      reportDiagnostic(context, {
        code: MAP_DIAGNOSTIC_CODES.ADJACENCY_RULE_DUPLICATE,
        path: `adjacency_rule.${rule.name}`,
        severity: 'warning',
        message: `Adjacency rule "${rule.name}" is declared more than once; the last declaration is used.`,
        filePath: path,
        entityId: rule.name,
      });
    }
    rules.set(rule.name, rule);
  }
  return rules;
}

function encodeAdjacencyLogic(logic: AdjacencyLogic): ClauseBlock {
  return new ClauseBlockBuilder()
    .yesNo('army', logic.army)
    .yesNo('navy', logic.navy)
    .yesNo('submarine', logic.submarine)
    .yesNo('trade', logic.trade)
    .build();
}

export function encodeAdjacencyRule(rule: AdjacencyRule): ClauseBlock {
  const builder = new ClauseBlockBuilder().quoted('name', rule.name);
  for (const key of ADJACENCY_LOGIC_KEYS) {
    builder.field(key, encodeAdjacencyLogic(rule[key]));
  }
  builder.list('required_provinces', rule.requiredProvinces).scalar('icon', rule.icon).list('offset', rule.offset);
  if (rule.isDisabled !== undefined) {
    builder.field('is_disabled', new ClauseBlockBuilder().quoted('tooltip', rule.isDisabled.tooltip).build());
  }
  return builder.build();
}

export function formatAdjacencyRules(rules: Iterable<AdjacencyRule>): string {
  const document = new ClauseBlockBuilder();
  for (const rule of rules) {
    document.field('adjacency_rule', encodeAdjacencyRule(rule));
  }
  return formatClauseDocument(document.build());
}
