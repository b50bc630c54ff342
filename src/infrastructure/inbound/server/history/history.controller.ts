// Application
import { type GetHistoryByDateUseCase } from '../../../../application/use-cases/history/get-history-by-date.use-case.js';
import { type GetHistoryStatsUseCase } from '../../../../application/use-cases/history/get-history-stats.use-case.js';
import { type GetTopScoredHistoryUseCase } from '../../../../application/use-cases/history/get-top-scored-history.use-case.js';
import { type LookupHistoryUseCase } from '../../../../application/use-cases/history/lookup-history.use-case.js';
import { type SearchHistoryUseCase } from '../../../../application/use-cases/history/search-history.use-case.js';

import { type HistoryHttpQuery, HistoryRequestHandler } from './history-request.handler.js';
import { HistoryResponsePresenter } from './history-response.presenter.js';

/**
 * Read-only views over the flash history
 */
export class HistoryController {
    private readonly requestHandler: HistoryRequestHandler;
    private readonly responsePresenter: HistoryResponsePresenter;

    constructor(
        private readonly getHistoryStatsUseCase: GetHistoryStatsUseCase,
        private readonly searchHistoryUseCase: SearchHistoryUseCase,
        private readonly getHistoryByDateUseCase: GetHistoryByDateUseCase,
        private readonly getTopScoredHistoryUseCase: GetTopScoredHistoryUseCase,
        private readonly lookupHistoryUseCase: LookupHistoryUseCase,
    ) {
        this.requestHandler = new HistoryRequestHandler();
        this.responsePresenter = new HistoryResponsePresenter();
    }

    async getByDate(rawQuery: HistoryHttpQuery) {
        const params = this.requestHandler.handleByDate(rawQuery);

        const records = await this.getHistoryByDateUseCase.execute(params);

        return this.responsePresenter.presentList(records);
    }

    async getStats() {
        const report = await this.getHistoryStatsUseCase.execute();

        return this.responsePresenter.presentStats(report);
    }

    async getTopScored(rawQuery: HistoryHttpQuery) {
        const params = this.requestHandler.handleTopScored(rawQuery);

        const records = await this.getTopScoredHistoryUseCase.execute(params);

        return this.responsePresenter.presentList(records);
    }

    async lookup(rawQuery: HistoryHttpQuery) {
        const lookup = this.requestHandler.handleLookup(rawQuery);

        const record = await this.lookupHistoryUseCase.execute(lookup);

        return this.responsePresenter.presentLookup(record);
    }

    async search(rawQuery: HistoryHttpQuery) {
        const params = this.requestHandler.handleSearch(rawQuery);

        const records = await this.searchHistoryUseCase.execute(params);

        return this.responsePresenter.presentList(records);
    }
}
