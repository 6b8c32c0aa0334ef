import { DocumentStore } from '../../connections/db/document-store';
import { PageContent } from '../../connections/db/models';
import { COLLECTIONS } from '../../constants';
import { NotFoundError } from '../../utils/errors';
import { serializeDocument } from '../../utils/serialize';
import { pageResponseSchema } from './pages.validation';

export class PagesService {
  constructor(private readonly store: DocumentStore) {}

  async getPageByKey(key: string): Promise<PageContent> {
    const doc = await this.store.findOne(COLLECTIONS.PAGE_CONTENT, { key });
    if (!doc) {
      throw new NotFoundError('Page not found');
    }
    return pageResponseSchema.parse(serializeDocument(doc));
  }
}
