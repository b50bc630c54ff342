// Application
import { type DeduplicateFlashesUseCase } from '../../../../application/use-cases/flashes/deduplicate-flashes.use-case.js';

import { FlashBatchRequestHandler } from './flash-batch-request.handler.js';
import { FlashesResponsePresenter } from './flashes-response.presenter.js';

/**
 * Orchestrates HTTP request handling for the deduplicate flashes endpoint
 */
export class DeduplicateFlashesController {
    private readonly requestHandler: FlashBatchRequestHandler;
    private readonly responsePresenter: FlashesResponsePresenter;

    constructor(private readonly deduplicateFlashesUseCase: DeduplicateFlashesUseCase) {
        this.requestHandler = new FlashBatchRequestHandler();
        this.responsePresenter = new FlashesResponsePresenter();
    }

    async deduplicate(rawBody: unknown) {
        const { commit, flashes } = this.requestHandler.handle(rawBody);

        const result = await this.deduplicateFlashesUseCase.execute(flashes, { commit });

        return this.responsePresenter.presentDeduplication(result);
    }
}
