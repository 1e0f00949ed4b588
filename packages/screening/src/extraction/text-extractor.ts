import { UnsupportedFormatError } from '../common/errors';
import { ResumeDocument } from '../models/resume-document';
import { DocParser } from './doc-parser';
import { DocxParser } from './docx-parser';
import { isCompoundFileBinary, MimeType } from './mime-type';
import { PdfParser } from './pdf-parser';

/**
 * Converts an uploaded resume into plain text, picking the parser by the declared media type.
 */
export class TextExtractor {
  constructor(
    private readonly pdfParser: PdfParser = new PdfParser(),
    private readonly docxParser: DocxParser = new DocxParser(),
    private readonly docParser: DocParser = new DocParser(),
  ) {}

  /**
   * @throws UnsupportedFormatError if the media type is not PDF, DOCX/DOC or plain text
   */
  async extract(document: ResumeDocument): Promise<string> {
    switch (document.mediaType) {
      case MimeType.PDF:
        return (await this.pdfParser.getTextContent(document.content)).trim();
      case MimeType.WORDPROCESSINGML_DOC:
        return (await this.docxParser.getTextContent(document.content)).trim();
      case MimeType.MS_WORD:
        if (isCompoundFileBinary(document.content)) {
          return (await this.docParser.getTextContent(document.content)).trim();
        }
        return (await this.docxParser.getTextContent(document.content)).trim();
      case MimeType.PLAIN_TEXT:
        return document.content.toString('utf-8').trim();
      default:
        throw new UnsupportedFormatError(document.mediaType);
    }
  }
}
