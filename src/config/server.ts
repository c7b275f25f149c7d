import path from 'path';

export const PORT = parseInt(process.env.PORT || '5000', 10);
export const HOST = process.env.HOST || '0.0.0.0';

/** Directory holding one <tier_id>.csv file of ZIP codes per tier */
export const ZIP_DATA_DIR = process.env.ZIP_DATA_DIR || path.join(__dirname, '../../data/zips');

/** Call records kept in the in-memory history */
export const HISTORY_CAPACITY = parseInt(process.env.HISTORY_CAPACITY || '10000', 10);
