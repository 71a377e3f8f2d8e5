import { setLogLevel } from '../src/pipeline/log';

setLogLevel('silent');
