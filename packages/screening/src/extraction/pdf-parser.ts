import { defaultLogger } from '@resume-screener/integration';
import pdf from 'pdf-parse';
import { errorMessage } from '../common/errors';

const log = defaultLogger({ serviceName: 'pdf-parser' });

export interface PdfTextItem {
  str?: string;
  transform?: number[];
}

export interface PdfTextContent {
  items: PdfTextItem[];
}

// Same options pdf-parse renders with by default
const TextContentOptions = {
  normalizeWhitespace: false,
  disableCombineTextItems: false,
};

/**
 * Lines of one page: items sharing a baseline are concatenated, a new baseline starts a new line.
 */
export function renderPageText(content: PdfTextContent): string {
  let text = '';
  let lastY: number | undefined = undefined;
  for (const item of content.items) {
    if (item.str == null) {
      continue;
    }
    const y = item.transform?.[5];
    if (lastY !== undefined && y !== lastY) {
      text += '\n';
    }
    text += item.str;
    lastY = y;
  }
  return text;
}

export class PdfParser {
  /**
   * Text of every page in order, one newline between pages. Pages without a text layer contribute an empty string.
   */
  async getTextContent(data: Buffer): Promise<string> {
    const pages: string[] = [];
    const { numpages } = await pdf(data, {
      // pdf-parse renders the pages one after another, so they are collected in page order
      pagerender: (pageData) =>
        pageData.getTextContent(TextContentOptions).then(
          (content: PdfTextContent) => {
            const text = renderPageText(content);
            pages.push(text);
            return text;
          },
          (error: unknown) => {
            log.warn(`Unable to read the text of PDF page ${pages.length + 1}: ${errorMessage(error)}`);
            pages.push('');
            return '';
          },
        ),
    });

    log.debug(`Successfully parsed PDF document (${numpages} pages)`);
    return pages.join('\n').trim();
  }
}
