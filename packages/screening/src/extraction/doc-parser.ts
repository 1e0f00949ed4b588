import { defaultLogger } from '@resume-screener/integration';
import WordExtractor from 'word-extractor';

const log = defaultLogger({ serviceName: 'doc-parser' });

/**
 * Legacy binary Word documents (Word 97-2003).
 */
export class DocParser {
  async getTextContent(data: Buffer): Promise<string> {
    const extractor = new WordExtractor();
    const extracted = await extractor.extract(data);

    log.debug(`Successfully parsed DOC document`);
    return extracted.getBody().trim();
  }
}
