export type LoggerFn = (message: string) => void;
