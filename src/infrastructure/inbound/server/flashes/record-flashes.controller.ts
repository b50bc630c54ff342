// Application
import { type RecordFlashesUseCase } from '../../../../application/use-cases/flashes/record-flashes.use-case.js';

import { FlashBatchRequestHandler } from './flash-batch-request.handler.js';
import { FlashesResponsePresenter } from './flashes-response.presenter.js';

/**
 * Commits flashes already judged new by an earlier deduplicate call
 */
export class RecordFlashesController {
    private readonly requestHandler: FlashBatchRequestHandler;
    private readonly responsePresenter: FlashesResponsePresenter;

    constructor(private readonly recordFlashesUseCase: RecordFlashesUseCase) {
        this.requestHandler = new FlashBatchRequestHandler();
        this.responsePresenter = new FlashesResponsePresenter();
    }

    async record(rawBody: unknown) {
        const { flashes } = this.requestHandler.handle(rawBody);

        const records = await this.recordFlashesUseCase.execute(flashes);

        return this.responsePresenter.presentRecorded(records);
    }
}
