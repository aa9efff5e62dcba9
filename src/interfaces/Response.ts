import type { ServerResponse } from 'node:http';

export type Response = ServerResponse;
