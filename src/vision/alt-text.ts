/** Sent ahead of the image when asking for alt text. */
export const ALT_TEXT_INSTRUCTION =
  'Write alt text for this image. Describe what it shows concisely and concretely, ' +
  'in one or two sentences suitable for a screen reader. ' +
  'Do not start with "Image of" or "Picture of", and reply with the alt text only.';
