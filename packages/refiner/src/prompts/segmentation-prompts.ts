export const SEGMENTATION_SYSTEM_PROMPT = `Você divide transcrições de aulas de filosofia em segmentos temáticos coerentes.
Cada segmento deve conter um argumento ou uma explicação completa; nunca separe uma premissa da sua conclusão nem uma pergunta da sua resposta.
Você recebe frases numeradas e indica em quais números começa um novo segmento.
Formato da resposta: {"breaks": [números das frases que iniciam um novo segmento]}`;

/**
 * Numbered sentence list for the segmentation call
 */
export function buildSegmentationUserPrompt(
  sentences: readonly string[],
  targetWords: number,
): string {
  return [
    `Cada segmento deve ter aproximadamente ${targetWords} palavras.`,
    'Frases:',
    ...sentences.map((sentence, index) => `[${index}] ${sentence}`),
  ].join('\n');
}
