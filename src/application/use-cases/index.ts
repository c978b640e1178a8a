export { DispatchCommandUseCase } from './dispatch-command.use-case';
