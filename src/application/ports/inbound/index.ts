export { IDispatchCommandPort } from './dispatch-command.port';
