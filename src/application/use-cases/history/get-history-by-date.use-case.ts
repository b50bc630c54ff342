import { TZDate } from '@date-fns/tz';
import { addDays } from 'date-fns';

// Domain
import { type HistoryRecord } from '../../../domain/entities/history-record.entity.js';

// Ports
import { type FlashHistoryRepositoryPort } from '../../ports/outbound/persistence/flash-history-repository.port.js';

/**
 * Calendar day in the reporting time zone
 */
export interface ReportingDay {
    day: number;
    month: number;
    year: number;
}

/**
 * Lists the flashes accepted on one calendar day of the reporting time zone
 * @description The day spans local midnight to local midnight; when no day is given, today
 * in that zone is used.
 */
export class GetHistoryByDateUseCase {
    constructor(
        private readonly flashHistoryRepository: FlashHistoryRepositoryPort,
        private readonly timeZone: string,
    ) {}

    public async execute(params: { date?: ReportingDay; limit: number }): Promise<HistoryRecord[]> {
        const day = params.date ?? this.today();
        const start = new TZDate(day.year, day.month - 1, day.day, 0, 0, 0, 0, this.timeZone);
        const end = addDays(start, 1);

        return this.flashHistoryRepository.findCreatedBetween({
            from: new Date(start.getTime()),
            limit: params.limit,
            to: new Date(end.getTime()),
        });
    }

    private today(): ReportingDay {
        const now = new TZDate(Date.now(), this.timeZone);
        return { day: now.getDate(), month: now.getMonth() + 1, year: now.getFullYear() };
    }
}
