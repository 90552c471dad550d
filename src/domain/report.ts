import { stringify } from "csv-stringify/sync";
import type { OccupancyResult } from "../types";

export const REPORT_PREFIX = 'Attendance_Occupancy_Report';

/**
 * Render the two-column report (`Time`, `Count (<date>)`) for one event date
 */
export const renderReportCsv = (result: OccupancyResult): string =>
    stringify([
        ['Time', `Count (${result.date})`],
        ...result.points.map(point => [point.time, point.display])
    ]);

/**
 * File name for a new report; `suffix` is a short random hex string
 */
export const reportFileName = (suffix: string): string => `${REPORT_PREFIX}_${suffix}.csv`;
