import { defaultLogger } from '@resume-screener/integration';
import mammoth from 'mammoth';

const log = defaultLogger({ serviceName: 'docx-parser' });

// mammoth terminates every paragraph with a blank line
const ParagraphSeparator = '\n\n';

export class DocxParser {
  /**
   * Paragraphs in document order, one per line.
   */
  async getTextContent(data: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer: data });
    result.messages.forEach((message) => log.debug(`DOCX parser ${message.type}: ${message.message}`));

    log.debug(`Successfully parsed DOCX document`);
    return result.value.split(ParagraphSeparator).join('\n').trim();
  }
}
