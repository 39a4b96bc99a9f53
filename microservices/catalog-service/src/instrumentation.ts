// Loaded first by the entry point: the instrumentations only patch modules
// required after they are registered.
import 'dotenv/config';
import { loadConfig } from './config';
import { initTracing } from './tracing';

export const tracerProvider = initTracing(loadConfig().tracing.endpoint);
