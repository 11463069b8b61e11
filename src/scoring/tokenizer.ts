// Токенизация в стиле mteval-v13a для sentence BLEU.

// Пунктуация и символы, отделяемые пробелами.
const PUNCTUATION_PATTERN = /([\{-\~\[-\` -\&\(-\+\:-\@\/])/g;

// Точка и запятая, если перед ними не цифра.
const PERIOD_COMMA_PRECEDED = /([^0-9])([\.,])/g;

// Точка и запятая, если после них не цифра.
const PERIOD_COMMA_FOLLOWED = /([\.,])([^0-9])/g;

// Дефис после цифры.
const DASH_AFTER_DIGIT = /([0-9])(-)/g;

// Заменяет HTML-сущности, которые оставляют некоторые системы перевода.
function unescapeEntities(line: string): string {
  if (!line.includes('&')) {
    return line;
  }
  return line
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>');
}

export function tokenize13a(line: string): string[] {
  let text = line.replace(/<skipped>/g, '').replace(/-\n/g, '').replace(/\n/g, ' ');
  text = ` ${unescapeEntities(text)} `;

  text = text
    .replace(PUNCTUATION_PATTERN, ' $1 ')
    .replace(PERIOD_COMMA_PRECEDED, '$1 $2 ')
    .replace(PERIOD_COMMA_FOLLOWED, ' $1 $2')
    .replace(DASH_AFTER_DIGIT, '$1 $2 ');

  return text.split(/\s+/).filter((token) => token.length > 0);
}
