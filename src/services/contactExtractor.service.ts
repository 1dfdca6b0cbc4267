import { ContactFields, NOT_FOUND } from "../helpers/contactRecord.helper";

// Optional "+", a digit, then 8+ digits/spaces/hyphens
const PHONE_REGEX = /\+?\d[\d\s-]{8,}/;
const EMAIL_REGEX = /[\w.-]+@[\w.-]+/;
const WEBSITE_REGEX = /https?:\/\/\S+|www\.\S+/;

const firstMatch = (text: string, pattern: RegExp): string => {
  const match = pattern.exec(text);
  return match ? match[0] : NOT_FOUND;
};

/**
 * Pulls phone, email and website out of raw OCR text. Values are returned as captured,
 * no validation or normalization; only separators trailing a phone number are dropped.
 */
export const extractContactFields = (text: string): ContactFields => {
  // Separators trailing the number belong to the gap before the next word
  const phone = firstMatch(text, PHONE_REGEX);

  return {
    Phone: phone === NOT_FOUND ? phone : phone.replace(/[\s-]+$/, ""),
    Email: firstMatch(text, EMAIL_REGEX),
    Website: firstMatch(text, WEBSITE_REGEX),
  };
};
