import WordExtractor from 'word-extractor';
import { DocParser } from '../../src/extraction/doc-parser';

jest.mock('word-extractor', () => {
  const extract = jest.fn();
  return jest.fn(() => ({ extract }));
});
jest.mock('@resume-screener/integration', () => ({
  defaultLogger: () => ({ debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }),
}));

describe('DocParser', () => {
  let extract: jest.Mock;

  beforeAll(() => {
    extract = new WordExtractor().extract as jest.Mock;
  });

  beforeEach(() => {
    extract.mockReset();
  });

  it('should return the trimmed document body', async () => {
    extract.mockResolvedValue({ getBody: () => '\nJane Doe\nCOBOL, DB2\n\n' });

    await expect(new DocParser().getTextContent(Buffer.from('doc'))).resolves.toBe('Jane Doe\nCOBOL, DB2');
    expect(extract).toHaveBeenCalledWith(Buffer.from('doc'));
  });

  it('should propagate parse failures', async () => {
    extract.mockRejectedValue(new Error('Unable to read this type of file'));

    await expect(new DocParser().getTextContent(Buffer.from('doc'))).rejects.toThrow('Unable to read this type of file');
  });
});
