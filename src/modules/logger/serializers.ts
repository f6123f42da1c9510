/**
 * With `wrapSerializers` on, pino-http runs its standard serializers first,
 * so these receive the serialized request and response, not the raw
 * `IncomingMessage` and `ServerResponse`.
 */
export type SerializedRequestInput = {
  id?: string | number;
  method?: string;
  url?: string;
  headers?: Record<string, unknown>;
};

export type SerializedResponseInput = {
  statusCode?: number;
  headers?: Record<string, unknown>;
};

export type RequestLog = {
  id?: string | number;
  method?: string;
  url?: string;
};

export type ResponseLog = {
  statusCode?: number;
};

export const requestSerializer = (req: SerializedRequestInput): RequestLog => ({
  id: req.id,
  method: req.method,
  url: req.url,
});

export const responseSerializer = (
  res: SerializedResponseInput,
): ResponseLog => ({
  statusCode: res.statusCode,
});
