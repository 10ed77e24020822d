export { Header } from './Header.js';
export { StepList, type StepState } from './StepList.js';
export { StatusBar } from './StatusBar.js';
export { BootstrapScreen } from './BootstrapScreen.js';
