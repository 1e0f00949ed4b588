import { retrieveContactDetails } from '../../src/common/contact-details';

describe('retrieveContactDetails', () => {
  it('should take the first line as the name and the first email found', () => {
    const text = '  Jane Doe  \nData Engineer\njane.doe@example.com | other@example.com';

    expect(retrieveContactDetails(text)).toEqual({ name: 'Jane Doe', email: 'jane.doe@example.com' });
  });

  it('should return a null email when none is present', () => {
    expect(retrieveContactDetails('John Smith\nNo contact')).toEqual({ name: 'John Smith', email: null });
  });

  it('should return an empty name for empty text', () => {
    expect(retrieveContactDetails('')).toEqual({ name: '', email: null });
  });
});
