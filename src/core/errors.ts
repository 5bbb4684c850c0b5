export type MetricsErrorCode =
  | 'INVALID_METRIC_NAME'
  | 'INVALID_LABEL'
  | 'INVALID_VALUE'
  | 'KIND_CONFLICT'
  | 'INVALID_CONFIG';

export class MetricsError extends Error {
  readonly code: MetricsErrorCode;

  constructor(code: MetricsErrorCode, message: string) {
    super(message);
    this.name = 'MetricsError';
    this.code = code;
  }
}

export class InvalidMetricNameError extends MetricsError {
  readonly metric: string;

  constructor(metric: string) {
    super('INVALID_METRIC_NAME', `invalid metric name "${metric}": must match [a-zA-Z_:][a-zA-Z0-9_:]*`);
    this.name = 'InvalidMetricNameError';
    this.metric = metric;
  }
}

export class InvalidLabelError extends MetricsError {
  readonly metric: string;
  readonly label: string;

  constructor(metric: string, label: string, reason: string) {
    super('INVALID_LABEL', `invalid label "${label}" on metric "${metric}": ${reason}`);
    this.name = 'InvalidLabelError';
    this.metric = metric;
    this.label = label;
  }
}
