import { WaterEngine } from './engine';

const engine = new WaterEngine((event, transfer = []) => {
  self.postMessage(event, { transfer });
});

self.addEventListener('message', (event: MessageEvent<unknown>) => {
  engine.handleMessage(event.data);
});

engine.announce();
