export { buildArchive, listArchiveEntries, extractArchiveEntries } from './archive-codec.js';
