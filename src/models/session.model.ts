// src/models/session.model.ts

import { InvoiceRecord } from './invoice.model';
import { InvoiceIndex } from '../services/index/invoice-index';

export type SessionStatus = 'active' | 'expired';

export interface Session {
    id: string;
    createdAt: Date;
    expiresAt: Date;
    lastAccessedAt: Date;
    status: SessionStatus;
    records: readonly InvoiceRecord[];
    index: InvoiceIndex;
    /** Bumped every time records are appended; guards concurrent appends. */
    revision: number;
    filesProcessed: number;
}
