import { TextCleaner } from '../utils/text-cleaner';

/**
 * Extra context a prompt should carry for a chunk
 */
export type ContextNeed = 'latin' | 'greek';

/**
 * Kind of lecture content a chunk holds, used to pick the prompt wording.
 * `scholastic` and `contemporary` are philosophy styles.
 */
export type ContentStyle =
  | { kind: 'scholastic'; markers: string[]; needs: ContextNeed[] }
  | { kind: 'contemporary'; markers: string[]; needs: ContextNeed[] }
  | { kind: 'lecture'; needs: ContextNeed[] }
  | { kind: 'general'; needs: ContextNeed[] };

export type ContentStyleKind = ContentStyle['kind'];

/**
 * Strategy injected into the refinement invoker
 */
export interface ContentStyleClassifier {
  classify(text: string): ContentStyle;
}

const SCHOLASTIC_MARKERS = [
  'quidditas',
  'haecceitas',
  'tomás de aquino',
  'suma teológica',
  'pedro lombardo',
  'escolástica',
  'silogismo',
  'quididade',
  'duns scotus',
  'ato e potência',
  'substância',
  'acidente',
];

const CONTEMPORARY_MARKERS = [
  'fenomenologia',
  'existencialismo',
  'hermenêutica',
  'pós-moderno',
  'desconstrução',
  'heidegger',
  'husserl',
  'nietzsche',
  'wittgenstein',
];

const LECTURE_MARKERS = [
  'aula',
  'professor',
  'aluno',
  'pergunta',
  'vejam',
  'prestem atenção',
  'na próxima',
  'como eu disse',
];

const PHILOSOPHY_MARKERS = [
  'filosofia',
  'filósofo',
  'metafísica',
  'ontologia',
  'epistemologia',
  'ente',
  'essência',
  'existência',
  'verdade',
  'ética',
  'lógica',
];

const LATIN_MARKERS = [
  'a priori',
  'a posteriori',
  'per se',
  'ergo',
  'sine qua non',
  'ipso facto',
  'ad hominem',
  'actus',
];

const GREEK_MARKERS = [
  'logos',
  'nous',
  'psyche',
  'physis',
  'telos',
  'ousia',
  'techne',
  'doxa',
  'episteme',
  'aletheia',
];

function findMarkers(folded: string, markers: readonly string[]): string[] {
  return markers.filter((marker) =>
    new RegExp(
      `(?<![\\p{L}\\p{N}])${TextCleaner.fold(marker)}(?![\\p{L}\\p{N}])`,
      'u',
    ).test(folded),
  );
}

/**
 * Keyword heuristic over accent-folded text:
 * - two or more scholastic markers → scholastic
 * - any contemporary marker → contemporary
 * - dialogue turns or classroom phrases → lecture
 * - otherwise general, or lecture when philosophy vocabulary shows up
 */
export class KeywordContentStyleClassifier implements ContentStyleClassifier {
  classify(text: string): ContentStyle {
    const folded = TextCleaner.fold(text);
    const needs = this.detectNeeds(folded);

    const scholastic = findMarkers(folded, SCHOLASTIC_MARKERS);
    if (scholastic.length >= 2) {
      return { kind: 'scholastic', markers: scholastic, needs };
    }

    const contemporary = findMarkers(folded, CONTEMPORARY_MARKERS);
    if (contemporary.length > 0) {
      return { kind: 'contemporary', markers: contemporary, needs };
    }

    const dialogueTurns = folded.match(/^\s*(?:professor|aluno|p|r)\s*:/gm);
    if (
      (dialogueTurns?.length ?? 0) >= 2 ||
      findMarkers(folded, LECTURE_MARKERS).length > 0 ||
      findMarkers(folded, PHILOSOPHY_MARKERS).length > 0
    ) {
      return { kind: 'lecture', needs };
    }

    return { kind: 'general', needs };
  }

  private detectNeeds(folded: string): ContextNeed[] {
    const needs: ContextNeed[] = [];
    if (findMarkers(folded, LATIN_MARKERS).length > 0) {
      needs.push('latin');
    }
    if (findMarkers(folded, GREEK_MARKERS).length > 0) {
      needs.push('greek');
    }
    return needs;
  }
}
