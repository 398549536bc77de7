export { MemoryMailTransport } from './memory_mail_transport';
