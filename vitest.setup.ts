import 'reflect-metadata';
import { Logger } from '@nestjs/common';

// Diagnostics are asserted through their sinks; keep the console quiet.
Logger.overrideLogger(false);
