/**
 * Unit tests for circular intent, topic and author reading
 */
import { classifyReportIntent, labelParagraphs, parseAuthorList } from '../../src/normalizer/report-intent';

describe('report intent', () => {
  describe('labelParagraphs', () => {
    it('labels the usual circular layout', () => {
      const paragraphs = [
        'A. Smith (Test Lab) report:',
        'We detected a fading source at RA, Dec = 1.0, 2.0.',
        'Light curves are posted at https://example.org/grb',
        'We thank the observatory staff.',
        'Questions go to observer@example.org.',
        'This message may be cited.',
        '[GCN OP NOTE] This circular was adjusted to fix the subject.',
      ];

      expect(labelParagraphs(paragraphs)).toEqual([
        'AuthorList',
        'ScientificContent',
        'ExternalLinks',
        'Acknowledgements',
        'ContactInformation',
        'CitationInstructions',
        'Correction',
      ]);
    });

    it('only takes the first paragraph as the author list', () => {
      expect(labelParagraphs(['We report:', 'B. Jones report:'])).toEqual(['AuthorList', 'ScientificContent']);
    });
  });

  describe('parseAuthorList', () => {
    it('gives every name the affiliation that follows it', () => {
      expect(
        parseAuthorList('A. Smith, B. Jones (Example Observatory),\nC. Lee and D. Kim (Other University) report:')
      ).toEqual([
        { name: 'A. Smith', affiliation: 'Example Observatory' },
        { name: 'B. Jones', affiliation: 'Example Observatory' },
        { name: 'C. Lee', affiliation: 'Other University' },
        { name: 'D. Kim', affiliation: 'Other University' },
      ]);
    });

    it('keeps trailing names without an affiliation', () => {
      expect(parseAuthorList('E. Park (Test Lab) and F. Roy report on behalf of the Test team:')).toEqual([
        { name: 'E. Park', affiliation: 'Test Lab' },
        { name: 'F. Roy' },
      ]);
    });
  });

  describe('classifyReportIntent', () => {
    it('recognizes a test circular', () => {
      expect(
        classifyReportIntent(
          'GRB 240301B: Swift-BAT test alert, not a real event',
          'This is a test. The simulated trigger is no real event.'
        )
      ).toBe('NON_EVENT_REPORT');
    });

    it('weighs the subject above the body', () => {
      // subject: follow-up (2); body: triggered (1)
      expect(classifyReportIntent('GRB 240301A: optical follow-up', 'Swift triggered on the burst.')).toBe(
        'FOLLOW_UP_OBSERVATION'
      );
    });

    it('reports a fresh detection', () => {
      expect(classifyReportIntent('GRB 240301A', 'Fermi GBM triggered on and detected GRB 240301A.')).toBe(
        'NEW_EVENT_DETECTION'
      );
    });

    it('prefers the earlier listed intent on a tie', () => {
      expect(classifyReportIntent('EP240301a', 'We set an upper limit and continue monitoring.')).toBe(
        'NON_DETECTION_LIMIT'
      );
    });

    it('does not match phrases inside longer words', () => {
      expect(classifyReportIntent('Weekly summary', 'Contested alerts, retested.')).toBeUndefined();
    });
  });
});
