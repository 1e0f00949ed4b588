import mammoth from 'mammoth';
import { DocxParser } from '../../src/extraction/docx-parser';

jest.mock('mammoth', () => ({ extractRawText: jest.fn() }));
jest.mock('@resume-screener/integration', () => ({
  defaultLogger: () => ({ debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }),
}));

describe('DocxParser', () => {
  const extractRawText = jest.mocked(mammoth.extractRawText);

  beforeEach(() => {
    extractRawText.mockReset();
  });

  it('should put every paragraph on its own line', async () => {
    extractRawText.mockResolvedValue({ value: 'Jane Doe\n\nSkills: Python\n\nExperience\n\n', messages: [] });

    await expect(new DocxParser().getTextContent(Buffer.from('docx'))).resolves.toBe(
      'Jane Doe\nSkills: Python\nExperience',
    );
    expect(extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('docx') });
  });

  it('should return an empty string for an empty document', async () => {
    extractRawText.mockResolvedValue({ value: '', messages: [] });

    await expect(new DocxParser().getTextContent(Buffer.from('docx'))).resolves.toBe('');
  });
});
