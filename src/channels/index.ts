/**
 * Channels Module
 *
 * @module channels
 */

export { ChannelListError, loadChannels, parseChannelList, sortByPriority } from './loader.js';
