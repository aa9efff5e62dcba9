import type { Server as HttpServer } from 'node:http';

// HTTPS server extends the HTTP one
export type Server = HttpServer;
