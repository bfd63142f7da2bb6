import { expect } from 'chai';
import { describe, it } from 'mocha';
import {
  hasPlaceholder,
  renderCommand,
  shellQuote,
  TRANSCRIPT_PLACEHOLDER,
} from '../lib/shell';
import { readShellWord, seededRandom } from './helpers/shell-word';

const NASTY_CHARACTERS = [
  "'",
  '"',
  '\\',
  '`',
  '$',
  ';',
  '&',
  '|',
  '\n',
  '\t',
  ' ',
  '*',
  '?',
  '~',
  '#',
  '(',
  ')',
  '{',
  '}',
  '<',
  '>',
  '!',
  'a',
  'Z',
  '0',
  'é',
  '😀',
];

describe('shellQuote', () => {
  it('should wrap plain text in single quotes', () => {
    expect(shellQuote('hello world')).to.equal("'hello world'");
  });

  it('should escape embedded single quotes', () => {
    expect(shellQuote("it's")).to.equal("'it'\\''s'");
  });

  it('should quote the empty string', () => {
    expect(shellQuote('')).to.equal("''");
  });

  it('should leave expansions inert', () => {
    const quoted = shellQuote('$(rm -rf ~); `id` && echo $HOME');
    expect(quoted).to.equal("'$(rm -rf ~); `id` && echo $HOME'");
    expect(readShellWord(quoted)).to.equal('$(rm -rf ~); `id` && echo $HOME');
  });

  it('should keep multi-line text as one word', () => {
    expect(readShellWord(shellQuote('line one\nline two'))).to.equal(
      'line one\nline two'
    );
  });

  it('should round-trip random text through the shell reader', () => {
    const random = seededRandom(20241019);

    for (let sample = 0; sample < 500; sample++) {
      const length = Math.floor(random() * 40);
      let text = '';
      for (let i = 0; i < length; i++) {
        text += NASTY_CHARACTERS[Math.floor(random() * NASTY_CHARACTERS.length)];
      }

      const quoted = shellQuote(text);

      expect(quoted.startsWith("'"), text).to.be.true;
      expect(quoted.endsWith("'"), text).to.be.true;
      expect(readShellWord(quoted)).to.equal(text);
    }
  });
});

describe('renderCommand', () => {
  it('should leave a template without placeholder unchanged', () => {
    expect(renderCommand('echo fixed', 'anything')).to.equal('echo fixed');
  });

  it('should substitute the quoted transcript', () => {
    expect(renderCommand('say ${text}', "it's late")).to.equal(
      "say 'it'\\''s late'"
    );
  });

  it('should substitute every placeholder with the same text', () => {
    expect(renderCommand('echo ${text} && log ${text}', 'hi')).to.equal(
      "echo 'hi' && log 'hi'"
    );
  });

  it('should not expand placeholders inside the transcript', () => {
    expect(renderCommand('echo ${text}', '${text}')).to.equal(
      "echo '${text}'"
    );
  });
});

describe('hasPlaceholder', () => {
  it('should detect the placeholder token', () => {
    expect(TRANSCRIPT_PLACEHOLDER).to.equal('${text}');
    expect(hasPlaceholder('agent --message ${text}')).to.be.true;
    expect(hasPlaceholder('agent --message $text')).to.be.false;
  });
});
