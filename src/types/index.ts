export * from './common';
export * from './native';
export * from './xvpn';
