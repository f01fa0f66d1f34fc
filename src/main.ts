import './style.css';
import { createDemoTerrain, DEFAULT_RESOLUTION_CM, fractionToCell } from './core';
import { WaterScene } from './render/scene';
import { WaterSimulation } from './simulation/coordinator';
import { WaterPanel } from './ui/panel';

const app = document.querySelector<HTMLDivElement>('#app');
if (!app) {
  throw new Error('Failed to find #app root');
}

const viewport = document.createElement('div');
viewport.className = 'viewport';
app.appendChild(viewport);

const terrain = createDemoTerrain();
const simulation = new WaterSimulation({ resolutionCm: DEFAULT_RESOLUTION_CM });
simulation.setTerrain(terrain);

const scene = new WaterScene(viewport, terrain);
const panel = new WaterPanel(app, simulation);

let hovered: [u: number, v: number] | null = null;

const showHoveredCell = (): void => {
  const [width, height] = simulation.getGridDimensions();
  const cell = hovered ? fractionToCell(hovered[0], hovered[1], width, height) : null;
  panel.showCell(cell ? simulation.sampleCell(cell[0], cell[1]) : null);
};

scene.onHover((fraction) => {
  hovered = fraction;
  showHoveredCell();
});

simulation.onUpdate((grid, width, height) => {
  scene.updateWater(grid, width, height, simulation.getWaterBounds());
});

simulation.onUpdate(() => {
  panel.refresh();
  showHoveredCell();
});

scene.start();
