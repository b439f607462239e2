import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('pagesim');

export default LibLogger;
