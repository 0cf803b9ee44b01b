/**
 * Text normalization for component matching
 * "20A Breaker", "20 amp breaker" and "20-Amp BREAKER" all become "20 a breaker"
 */

const UNIT_SYNONYMS: Readonly<Record<string, string>> = {
  amp: 'a',
  amps: 'a',
  ampere: 'a',
  amperes: 'a',
  milliamp: 'ma',
  milliamps: 'ma',
  kiloamp: 'ka',
  kiloamps: 'ka',
  volt: 'v',
  volts: 'v',
  vac: 'v',
  kilovolt: 'kv',
  kilovolts: 'kv',
  watt: 'w',
  watts: 'w',
  kilowatt: 'kw',
  kilowatts: 'kw',
  hertz: 'hz',
  pole: 'p',
  poles: 'p',
  phase: 'ph',
  phases: 'ph',
  millimeter: 'mm',
  millimetre: 'mm',
  millimeters: 'mm',
  millimetres: 'mm'
};

const NOISE_WORDS = new Set([
  'the', 'of', 'with', 'and', 'for', 'to', 'in', 'on',
  'x', 'type', 'unit', 'units', 'pc', 'pcs', 'no', 'nos', 'qty', 'ea'
]);

const GLUED_UNIT = /^(\d+(?:\.\d+)?)([a-z]+)$/;

function canonicalToken(token: string): string {
  return UNIT_SYNONYMS[token] ?? token;
}

export function tokenize(text: string | null | undefined): string[] {
  if (!text) return [];

  const cleaned = text
    .toLowerCase()
    .replace(/[^a-z0-9.]+/g, ' ')
    // keep decimal points only between digits
    .replace(/(?<!\d)\.|\.(?!\d)/g, ' ');

  const tokens: string[] = [];
  for (const raw of cleaned.split(/\s+/)) {
    if (!raw) continue;

    const glued = GLUED_UNIT.exec(raw);
    const parts = glued ? [glued[1], glued[2]] : [raw];

    for (const part of parts) {
      const token = canonicalToken(part);
      if (!NOISE_WORDS.has(token)) tokens.push(token);
    }
  }
  return tokens;
}

export function normalizeText(text: string | null | undefined): string {
  return tokenize(text).join(' ');
}

/** Nothing that reads as a component name: no token carries a letter */
export function isNoise(text: string | null | undefined): boolean {
  return !tokenize(text).some(token => /[a-z]/.test(token));
}

/** Case-insensitive identity comparison; 'Unknown' counts as absent */
export function normalizeIdentity(value: string | null | undefined): string {
  const trimmed = (value ?? '').trim().toLowerCase();
  return trimmed === 'unknown' ? '' : trimmed;
}
