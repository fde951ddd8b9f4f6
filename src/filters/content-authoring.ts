/**
 * Filters of the content authoring subdomain.
 */

import { LMS_PAGE_URL_REQUESTED } from './names.js';
import { PublicFilter } from './public-filter.js';

/** Runs when an authoring page links to a page of the learner site. */
export class LMSPageURLRequested extends PublicFilter {
  readonly filterType = LMS_PAGE_URL_REQUESTED;

  runFilter(url: string, org: string): { url: unknown; org: unknown } {
    const data = this.runPipeline({ url, org });
    return { url: data['url'], org: data['org'] };
  }
}
