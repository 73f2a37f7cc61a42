/** Classification of a single upload attempt. */
export type UploadOutcome = 'retriable' | 'success' | 'fatal'
