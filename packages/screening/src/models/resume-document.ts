/**
 * An uploaded resume. Only lives for the duration of the text extraction.
 */
export interface ResumeDocument {
  name: string;
  mediaType: string;
  content: Buffer;
}
