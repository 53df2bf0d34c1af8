const POSITIVES = new Set([
  'y',
  'yes',
  'yeah',
  'yep',
  'yup',
  'sure',
  'ok',
  'okay',
  'confirm',
  'confirmed',
  'correct',
  'go ahead',
  'do it',
  'submit',
  'sounds good',
  'looks good',
  'please do',
  'right',
]);

const NEGATIVES = new Set(['n', 'no', 'nope', 'nah', 'not really', 'dont', 'do not', 'wrong', 'incorrect']);

export class ConfirmationParser {
  /** `true` for a yes, `false` for a no, `null` when the reply is neither. */
  parse(input: string): boolean | null {
    const normalized = input
      .toLowerCase()
      .normalize('NFD')
      .replace(/\p{Diacritic}/gu, '')
      .replace(/[^\p{L}\p{N}\s]/gu, '')
      .trim()
      .replace(/\s+/g, ' ');

    if (!normalized) return null;
    if (POSITIVES.has(normalized)) return true;
    if (NEGATIVES.has(normalized)) return false;

    // "yes please", "no thanks"
    const [head, ...rest] = normalized.split(' ');
    const tail = rest.join(' ');
    const polite = /^(?:please|thanks|thank you|thats right|that is right|go ahead|confirm|submit it)$/;
    if (POSITIVES.has(head) && polite.test(tail)) return true;
    if (NEGATIVES.has(head) && /^(?:thanks|thank you|dont|do not submit|cancel)$/.test(tail)) return false;
    return null;
  }
}
