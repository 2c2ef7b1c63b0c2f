import type {
  ContentStyle,
  ContextNeed,
} from '../classifiers/content-style-classifier';

const BASE_RULES = `REGRAS ABSOLUTAS:
1. NÃO reordene frases nem parágrafos.
2. NÃO acrescente nem remova ideias, exemplos ou citações.
3. NÃO crie transições, títulos, listas ou comentários.
4. NÃO resuma: o texto corrigido deve ter praticamente o mesmo tamanho do original.
5. Preserve o tom oral da aula, inclusive repetições e expressões coloquiais.
6. Corrija SOMENTE ortografia, pontuação, concordância quebrada pela transcrição e termos técnicos mal transcritos.
7. Mantenha as quebras de parágrafo exatamente onde estão.
8. Responda apenas com o texto corrigido, sem explicações.`;

const STYLE_CONTEXT: Record<ContentStyle['kind'], string> = {
  scholastic: `Você é um especialista em filosofia medieval e escolástica, com domínio de latim, grego e português acadêmico.
O trecho pode citar autores medievais (Tomás de Aquino, Duns Scotus, Pedro Lombardo), termos latinos (quidditas, haecceitas, esse, ens) e a estrutura da quaestio disputata (videtur quod, sed contra, respondeo). Preserve distinções e fórmulas escolásticas literalmente.`,
  contemporary: `Você é um especialista em filosofia contemporânea, familiarizado com fenomenologia, existencialismo e hermenêutica.
O trecho mistura linguagem coloquial e vocabulário técnico. Preserve o estilo pessoal do professor e corrija apenas nomes e termos mal transcritos.`,
  lecture: `Você é um revisor de transcrições de aulas de filosofia em português do Brasil.
O trecho é fala espontânea de professor, às vezes com perguntas de alunos. Preserve o caráter didático e a sequência da exposição.`,
  general: `Você é um revisor de transcrições automáticas em português do Brasil.`,
};

const NEED_CONTEXT: Record<ContextNeed, string> = {
  latin:
    'Expressões latinas devem seguir a grafia clássica (a priori, per se, sine qua non, ad hominem).',
  greek:
    'Termos gregos devem ser transliterados de forma consistente (logos, ousia, physis, techne, aletheia).',
};

const EMPHASIS = `ATENÇÃO: uma resposta anterior para este mesmo trecho ficou muito mais curta ou muito mais longa que o original.
NÃO resuma, NÃO omita frases e NÃO acrescente conteúdo. Devolva o trecho inteiro, frase por frase, apenas com as correções mínimas.`;

/**
 * System prompt for refining a chunk of the given style
 */
export function buildRefinementSystemPrompt(style: ContentStyle): string {
  const sections = [STYLE_CONTEXT[style.kind], BASE_RULES];
  const needs = style.needs.map((need) => NEED_CONTEXT[need]);
  if (needs.length > 0) {
    sections.push(needs.join('\n'));
  }
  return sections.join('\n\n');
}

export interface RefinementPromptContext {
  /** 1-based position of the chunk in the document */
  position: number;
  total: number;
  /** Ask again after a degraded answer */
  emphasized: boolean;
}

/**
 * User prompt carrying the chunk text between <transcricao> tags
 */
export function buildRefinementUserPrompt(
  text: string,
  context: RefinementPromptContext,
): string {
  const lines = [
    `Transcrição (parte ${context.position} de ${context.total}):`,
    '<transcricao>',
    text,
    '</transcricao>',
  ];
  if (context.emphasized) {
    lines.unshift(EMPHASIS, '');
  }
  lines.push(
    '',
    'Devolva o trecho corrigido mantendo TOTAL fidelidade ao original.',
  );
  return lines.join('\n');
}
