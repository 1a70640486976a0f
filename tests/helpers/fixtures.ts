/**
 * A three-article statute whose second article spans two paragraphs
 */
export const SAMPLE_PAGES = [
  { pageNumber: 1, text: 'قانون تجريبي\nمادة ١\nنص المادة الأولى.' },
  {
    pageNumber: 2,
    text:
      'مادة ٢\nالفقرة الأولى من المادة الثانية.\n\nالفقرة الثانية من المادة الثانية.\n' +
      'مادة ٣\nنص المادة الثالثة.',
  },
];
