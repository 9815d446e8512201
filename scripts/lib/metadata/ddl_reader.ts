/**
 * Reader for the DDL2 dictionary text format: `data_` blocks holding
 * `save_` frames, tag/value pairs, `loop_` tables, quoted strings and
 * semicolon-delimited text fields.
 */

type TokenKind = 'data' | 'save' | 'save-end' | 'loop' | 'tag' | 'value';

interface Token {
  kind: TokenKind;
  text: string;
  line: number;
}

/** Tag names are stored lowercase without the leading underscore. */
export type DdlValues = Map<string, string[]>;

export interface DdlFrame {
  name: string;
  values: DdlValues;
}

export interface DdlBlock {
  name: string;
  values: DdlValues;
  frames: DdlFrame[];
}

function classifyBareWord(word: string): TokenKind {
  const lower = word.toLowerCase();
  if (word.startsWith('_')) {
    return 'tag';
  }
  if (lower === 'loop_') {
    return 'loop';
  }
  if (lower.startsWith('data_')) {
    return 'data';
  }
  if (lower === 'save_') {
    return 'save-end';
  }
  if (lower.startsWith('save_')) {
    return 'save';
  }
  return 'value';
}

function tokenize(text: string): Token[] {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const tokens: Token[] = [];

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex += 1) {
    const line = lines[lineIndex];
    const lineNumber = lineIndex + 1;

    if (line.startsWith(';')) {
      const parts = [line.slice(1)];
      let closed = false;
      while (lineIndex + 1 < lines.length) {
        lineIndex += 1;
        if (lines[lineIndex].startsWith(';')) {
          closed = true;
          break;
        }
        parts.push(lines[lineIndex]);
      }
      if (!closed) {
        throw new Error(`Unterminated text field starting on line ${lineNumber}`);
      }
      tokens.push({ kind: 'value', text: parts.join('\n').trim(), line: lineNumber });
      continue;
    }

    let position = 0;
    while (position < line.length) {
      const char = line[position];
      if (char === ' ' || char === '\t') {
        position += 1;
        continue;
      }
      if (char === '#') {
        break;
      }

      if (char === "'" || char === '"') {
        // a quote only closes when followed by whitespace or end of line
        let end = position + 1;
        while (end < line.length) {
          if (line[end] === char && (end + 1 === line.length || /\s/.test(line[end + 1]))) {
            break;
          }
          end += 1;
        }
        if (end >= line.length) {
          throw new Error(`Unterminated quoted value on line ${lineNumber}`);
        }
        tokens.push({ kind: 'value', text: line.slice(position + 1, end), line: lineNumber });
        position = end + 1;
        continue;
      }

      let end = position;
      while (end < line.length && line[end] !== ' ' && line[end] !== '\t') {
        end += 1;
      }
      const word = line.slice(position, end);
      tokens.push({ kind: classifyBareWord(word), text: word, line: lineNumber });
      position = end;
    }
  }

  return tokens;
}

function appendValues(target: DdlValues, tag: string, values: string[]): void {
  const key = tag.replace(/^_/, '').toLowerCase();
  const existing = target.get(key);
  if (existing) {
    existing.push(...values);
  } else {
    target.set(key, [...values]);
  }
}

export function readDdl(text: string): DdlBlock[] {
  const tokens = tokenize(text);
  const blocks: DdlBlock[] = [];
  let block: DdlBlock | null = null;
  let target: DdlValues | null = null;
  let index = 0;

  const requireTarget = (token: Token): DdlValues => {
    if (!target) {
      throw new Error(`Line ${token.line}: '${token.text}' appears before any data_ block`);
    }
    return target;
  };

  while (index < tokens.length) {
    const token = tokens[index];
    index += 1;

    switch (token.kind) {
      case 'data': {
        block = { name: token.text.slice('data_'.length), values: new Map(), frames: [] };
        blocks.push(block);
        target = block.values;
        break;
      }
      case 'save': {
        if (!block) {
          throw new Error(`Line ${token.line}: save frame outside a data_ block`);
        }
        const frame: DdlFrame = { name: token.text.slice('save_'.length), values: new Map() };
        block.frames.push(frame);
        target = frame.values;
        break;
      }
      case 'save-end': {
        target = block ? block.values : null;
        break;
      }
      case 'loop': {
        const values = requireTarget(token);
        const tags: string[] = [];
        while (index < tokens.length && tokens[index].kind === 'tag') {
          tags.push(tokens[index].text);
          index += 1;
        }
        const cells: string[] = [];
        while (index < tokens.length && tokens[index].kind === 'value') {
          cells.push(tokens[index].text);
          index += 1;
        }
        if (tags.length === 0) {
          throw new Error(`Line ${token.line}: loop_ without tags`);
        }
        if (cells.length % tags.length !== 0) {
          throw new Error(
            `Line ${token.line}: loop of ${tags.length} tags has ${cells.length} values`
          );
        }
        tags.forEach((tag, column) => {
          appendValues(
            values,
            tag,
            cells.filter((_, cellIndex) => cellIndex % tags.length === column)
          );
        });
        break;
      }
      case 'tag': {
        const values = requireTarget(token);
        const next = tokens[index];
        if (!next || next.kind !== 'value') {
          throw new Error(`Line ${token.line}: tag '${token.text}' has no value`);
        }
        index += 1;
        appendValues(values, token.text, [next.text]);
        break;
      }
      case 'value':
        throw new Error(`Line ${token.line}: unexpected value '${token.text}'`);
    }
  }

  return blocks;
}

export function firstValue(values: DdlValues, tag: string): string | null {
  return values.get(tag)?.[0] ?? null;
}
