export { getLog } from '@fireside/core';
