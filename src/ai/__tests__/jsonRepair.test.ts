import { describe, it, expect } from 'vitest';
import {
  parseModelJson,
  repairModelJson,
  stripCodeFence,
  repairTruncatedJson,
  forceCloseJson,
  type JsonObject,
} from '../jsonRepair.js';

const FALLBACK: JsonObject = { fallback: true };

/* ============= stripCodeFence ============= */

describe('stripCodeFence', () => {
  it('leaves unfenced text alone apart from trimming', () => {
    expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}');
  });

  it('removes a json fence', () => {
    expect(stripCodeFence('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('removes a bare fence', () => {
    expect(stripCodeFence('```\n{"a": 1}\n```')).toBe('{"a": 1}');
  });

  it('tolerates a missing closing fence', () => {
    expect(stripCodeFence('```json\n{"a": 1')).toBe('{"a": 1');
  });
});

/* ============= parseModelJson: short-circuits ============= */

describe('parseModelJson', () => {
  it('returns the fallback object itself for empty content', () => {
    expect(parseModelJson('', FALLBACK)).toBe(FALLBACK);
    expect(parseModelJson('   \n\t ', FALLBACK)).toBe(FALLBACK);
    expect(parseModelJson(null, FALLBACK)).toBe(FALLBACK);
  });

  it('normalizes a missing fallback to an empty object', () => {
    expect(parseModelJson('', null)).toEqual({});
    expect(parseModelJson('not json at all')).toEqual({});
  });

  it('parses valid JSON unchanged', () => {
    const payload = {
      overall_score: 65,
      legal_risk: 'Medium',
      detected_risks: { penalty_clause: true, auto_renewal: false },
      detailed_risks: [{ category: 'Penalty', description: 'Late fee of 2% per month.' }],
    };
    expect(parseModelJson(JSON.stringify(payload), FALLBACK)).toEqual(payload);
    expect(parseModelJson(JSON.stringify(payload, null, 2), FALLBACK)).toEqual(payload);
  });

  it('parses fenced JSON like the unwrapped payload', () => {
    const inner = '{"is_compliant": false, "applicable_laws": ["Indian Contract Act 1872"]}';
    expect(parseModelJson('```json\n' + inner + '\n```', FALLBACK)).toEqual(
      parseModelJson(inner, FALLBACK)
    );
  });

  it('treats a top-level array as unparseable', () => {
    expect(parseModelJson('[1, 2, 3]', FALLBACK)).toBe(FALLBACK);
  });

  it('returns the fallback when no stage can recover an object', () => {
    expect(parseModelJson('I could not analyze this contract.', FALLBACK)).toBe(FALLBACK);
    expect(parseModelJson('{"a": 1, "b": [1, 2,],}', FALLBACK)).toBe(FALLBACK);
  });
});

/* ============= Truncation repair ============= */

describe('truncation repair', () => {
  it('drops an incomplete trailing line and closes the structure', () => {
    const content =
      '{\n  "contract_type": "Employment Agreement",\n' +
      '  "parties": ["Employer: Acme Private Limited", "Employee: Ravi Kumar"],\n' +
      '  "dates": ["January 1, 2024 — Start';

    const outcome = repairModelJson(content, FALLBACK);
    expect(outcome.stage).toBe('truncation');
    expect(outcome.value).toEqual({
      contract_type: 'Employment Agreement',
      parties: ['Employer: Acme Private Limited', 'Employee: Ravi Kumar'],
    });
  });

  it('keeps completed array items of a multi-line array', () => {
    const content =
      '{\n  "contract_type": "Service Agreement",\n  "parties": [\n' +
      '    "Client: Orion Retail Private Limited",\n    "Service Provider: BlueWave';

    expect(parseModelJson(content, FALLBACK)).toEqual({
      contract_type: 'Service Agreement',
      parties: ['Client: Orion Retail Private Limited'],
    });
  });

  it('repairs a fenced response that lost its closing fence', () => {
    expect(parseModelJson('```json\n{"overall_score": 40', FALLBACK)).toEqual({ overall_score: 40 });
  });

  it('closes by naive counts, brackets before braces', () => {
    expect(repairTruncatedJson('{"clauses": [{"type": "Termination"')).toBe(
      '{"clauses": [{"type": "Termination"]}}'
    );
  });

  it('returns null when no line ends like a complete value', () => {
    expect(repairTruncatedJson('{"overall_score": 65, "legal_risk":')).toBeNull();
  });

  it('strips a trailing comma, then closes an unterminated string', () => {
    expect(repairTruncatedJson('{"a": "x", "b": "y,')).toBe('{"a": "x", "b": "y"}');
  });
});

/* ============= Forced close ============= */

describe('forced close', () => {
  it('closes nested structures in stack order', () => {
    const outcome = repairModelJson('{"clauses": [{"type": "Termination", "risk_level": "Medium"', FALLBACK);
    expect(outcome.stage).toBe('forced_close');
    expect(outcome.value).toEqual({
      clauses: [{ type: 'Termination', risk_level: 'Medium' }],
    });
  });

  it('closes a string cut after an escaped quote', () => {
    expect(parseModelJson('{"note": "He said \\"stop', FALLBACK)).toEqual({
      note: 'He said "stop',
    });
  });

  it('discards prose before the first brace', () => {
    const forced = forceCloseJson('Result: {"a": [1, 2');
    expect(forced?.text).toBe('{"a": [1, 2]}');
  });

  it('reports characters after the last complete position', () => {
    expect(forceCloseJson('{"a": 1, "b": ')?.danglingChars).toBe(2);
    expect(forceCloseJson('{"a": 1}')?.danglingChars).toBe(0);
  });

  it('returns null without an opening brace', () => {
    expect(forceCloseJson('no json here')).toBeNull();
  });

  it('gives up on a dangling key', () => {
    const content = '{\n  "is_compliant": false,\n  "violations": [\n    {"law": "Section 27",\n     "issue":';
    expect(repairModelJson(content, FALLBACK)).toEqual({ value: FALLBACK, stage: 'fallback' });
  });
});

/* ============= Properties ============= */

describe('repair properties', () => {
  const payload = {
    contract_type: 'Service Agreement',
    parties: ['Client: Orion Retail Private Limited', 'Service Provider: BlueWave Analytics LLP'],
    amounts: ['INR 2,50,000/month — Service Fee'],
    clauses: [
      { type: 'Termination', risk_level: 'Medium', explanation: 'Thirty days written notice.' },
      { type: 'Non-Compete', risk_level: 'High', explanation: 'One year restriction.' },
    ],
  };
  const text = JSON.stringify(payload, null, 2);

  it('keeps every key whose value was complete before the cut', () => {
    // cut inside the second clause's explanation
    const cut = text.slice(0, text.indexOf('One year') + 4);
    const repaired = parseModelJson(cut, FALLBACK);

    expect(repaired.contract_type).toBe(payload.contract_type);
    expect(repaired.parties).toEqual(payload.parties);
    expect(repaired.amounts).toEqual(payload.amounts);
  });

  it('is stable when a repaired object is serialized and repaired again', () => {
    const cuts = [40, 120, 200, text.length - 30, text.length - 5];
    for (const at of cuts) {
      const once = parseModelJson(text.slice(0, at), FALLBACK);
      const twice = parseModelJson(JSON.stringify(once), FALLBACK);
      expect(twice).toEqual(once);
    }
  });
});
