export { hashSecret, verifySecret } from './secret_hash';
