export { classifyKey, isOnKeypad, describeKeypadEvent } from './keypad';
