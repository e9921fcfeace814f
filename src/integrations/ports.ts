import type { DeliveryError } from "../errors";
import type { Incident, QaReport, Result } from "../types";

export interface IncidentSource {
	/** Closed incidents whose closure time lies in `[earliest, latest)`, unix seconds. */
	fetchClosedIncidents(earliest: number, latest: number): Promise<Incident[]>;
}

export interface ReportSink {
	deliver(report: QaReport): Promise<Result<void, DeliveryError>>;
}
