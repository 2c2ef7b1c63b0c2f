import { describe, expect, test } from 'vitest';

import {
  buildRefinementSystemPrompt,
  buildRefinementUserPrompt,
} from './refinement-prompts';
import { buildSegmentationUserPrompt } from './segmentation-prompts';

describe('refinement prompts', () => {
  test('system prompt opens with the style context and carries the rules', () => {
    const prompt = buildRefinementSystemPrompt({ kind: 'general', needs: [] });

    expect(prompt.startsWith('Você é um revisor de transcrições automáticas')).toBe(
      true,
    );
    expect(prompt).toContain('4. NÃO resuma');
    expect(prompt).not.toContain('Expressões latinas');
  });

  test('system prompt adds context for Latin and Greek', () => {
    const prompt = buildRefinementSystemPrompt({
      kind: 'scholastic',
      markers: ['quidditas', 'haecceitas'],
      needs: ['latin', 'greek'],
    });

    expect(prompt).toContain('filosofia medieval e escolástica');
    expect(prompt.endsWith(
      'Expressões latinas devem seguir a grafia clássica (a priori, per se, sine qua non, ad hominem).\n' +
        'Termos gregos devem ser transliterados de forma consistente (logos, ousia, physis, techne, aletheia).',
    )).toBe(true);
  });

  test('user prompt wraps the text between tags', () => {
    expect(
      buildRefinementUserPrompt('O ente é.', {
        position: 2,
        total: 5,
        emphasized: false,
      }),
    ).toBe(
      [
        'Transcrição (parte 2 de 5):',
        '<transcricao>',
        'O ente é.',
        '</transcricao>',
        '',
        'Devolva o trecho corrigido mantendo TOTAL fidelidade ao original.',
      ].join('\n'),
    );
  });

  test('emphasized user prompt starts with the warning', () => {
    const prompt = buildRefinementUserPrompt('O ente é.', {
      position: 1,
      total: 1,
      emphasized: true,
    });

    expect(prompt.startsWith('ATENÇÃO: uma resposta anterior')).toBe(true);
    expect(prompt).toContain('<transcricao>\nO ente é.\n</transcricao>');
  });
});

describe('segmentation prompts', () => {
  test('numbers the sentences from zero', () => {
    expect(buildSegmentationUserPrompt(['Primeira.', 'Segunda.'], 300)).toBe(
      [
        'Cada segmento deve ter aproximadamente 300 palavras.',
        'Frases:',
        '[0] Primeira.',
        '[1] Segunda.',
      ].join('\n'),
    );
  });
});
