import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('reel-cache');

export default LibLogger;
