// ============================================================
// Vision Analyzer - Express Server Entry Point
// ============================================================

import 'dotenv/config';
import { startServer } from './server';

startServer();
