import 'winston';
import { LeveledLogMethod } from 'winston';

// Levels this project adds on top of the npm set
declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        trace: LeveledLogMethod;
    }
}
