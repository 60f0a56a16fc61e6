export * from './analytics.menu';
export * from './cli-session';
export * from './console.io';
export * from './employee.cli';
export * from './employee.view';
export * from './prompter';
