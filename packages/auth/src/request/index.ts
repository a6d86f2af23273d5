export type { MacRequest } from './types';
export { requestFromRaw } from './fromRaw';
export { requestFromUrl, findHeader } from './fromUrl';
export type { HeaderBag } from './fromUrl';
export { requestFromIncomingMessage } from './fromIncomingMessage';
