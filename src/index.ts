export * from './components/sheet';
export { default } from './components/sheet/Sheet';
