export { Debouncer } from './debouncer';
export { sleep, errorMessage } from './sleep';
