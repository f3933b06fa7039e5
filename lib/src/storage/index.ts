/**
 * Storage Module
 */

export { saveUploadToDirectory, deleteStoredFile } from './file-store.js';
