export {
  useBootstrap,
  bootstrapReducer,
  initialBootstrapState,
  type BootstrapState,
  type BootstrapPhase,
  type BootstrapNotice,
  type UseBootstrapOptions,
} from './useBootstrap.js';
