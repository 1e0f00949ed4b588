const EmailPattern = /[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+/;

export interface ContactDetails {
  name: string;
  email: string | null;
}

/**
 * Resumes usually start with the candidate name, so the first line is taken as the name.
 */
export function retrieveContactDetails(text: string): ContactDetails {
  const match = text.match(EmailPattern);
  return {
    name: text.split('\n')[0].trim(),
    email: match != null ? match[0] : null,
  };
}
