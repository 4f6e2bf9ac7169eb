import type { TokenCodec } from '../../src/ingest/types.js';

/**
 * Whitespace tokenizer: one token per word, ids assigned on first sight.
 */
export function wordCodec(): TokenCodec {
  const vocab: string[] = [];
  const ids = new Map<string, number>();
  return {
    encode(text) {
      return text
        .split(/\s+/)
        .filter(Boolean)
        .map((word) => {
          let id = ids.get(word);
          if (id === undefined) {
            id = vocab.length;
            vocab.push(word);
            ids.set(word, id);
          }
          return id;
        });
    },
    decode(tokens) {
      return tokens.map((id) => vocab[id] ?? '').join(' ');
    },
  };
}

/** `count` distinct words: w00 w01 ... */
export function words(count: number, offset = 0): string {
  return Array.from({ length: count }, (_, i) => `w${String(i + offset).padStart(2, '0')}`).join(' ');
}
