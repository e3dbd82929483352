import type { Locator, Page } from 'playwright-core';
import { HUMAN_CONFIG } from '../config.js';

/**
 * Paced input helpers so form filling looks like a person at the keyboard
 */

// Random integer between min and max, inclusive
export function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

export async function humanDelay(min = HUMAN_CONFIG.minActionDelay, max = HUMAN_CONFIG.maxActionDelay): Promise<void> {
  const delay = randomBetween(min, max);
  await new Promise((resolve) => setTimeout(resolve, delay));
}

function bezierPoint(t: number, p0: number, p1: number, p2: number, p3: number): number {
  const u = 1 - t;
  return u * u * u * p0 + 3 * u * u * t * p1 + 3 * u * t * t * p2 + t * t * t * p3;
}

export function bezierPath(
  start: { x: number; y: number },
  end: { x: number; y: number },
  steps: number
): Array<{ x: number; y: number }> {
  const cp1x = start.x + (end.x - start.x) * 0.25 + randomBetween(-50, 50);
  const cp1y = start.y + (end.y - start.y) * 0.1 + randomBetween(-30, 30);
  const cp2x = start.x + (end.x - start.x) * 0.75 + randomBetween(-50, 50);
  const cp2y = start.y + (end.y - start.y) * 0.9 + randomBetween(-30, 30);

  const points: Array<{ x: number; y: number }> = [];
  for (let i = 0; i <= steps; i++) {
    const t = i / steps;
    points.push({
      x: bezierPoint(t, start.x, cp1x, cp2x, end.x),
      y: bezierPoint(t, start.y, cp1y, cp2y, end.y),
    });
  }
  return points;
}

export async function humanMove(page: Page, targetX: number, targetY: number): Promise<void> {
  // Start from the viewport centre; Playwright does not expose the pointer
  const viewport = page.viewportSize();
  const start = { x: viewport ? viewport.width / 2 : 500, y: viewport ? viewport.height / 2 : 300 };

  for (const point of bezierPath(start, { x: targetX, y: targetY }, HUMAN_CONFIG.mouseMovementSteps)) {
    await page.mouse.move(point.x, point.y);
    await new Promise((resolve) => setTimeout(resolve, randomBetween(5, 15)));
  }
}

export async function humanClick(page: Page, locator: Locator): Promise<void> {
  const box = await locator.boundingBox();
  if (!box) {
    // Off-screen or zero-size controls still take a plain click
    await locator.click();
    await humanDelay(200, 500);
    return;
  }

  const offsetX = randomBetween(-Math.floor(box.width * 0.2), Math.floor(box.width * 0.2));
  const offsetY = randomBetween(-Math.floor(box.height * 0.2), Math.floor(box.height * 0.2));
  const clickX = box.x + box.width / 2 + offsetX;
  const clickY = box.y + box.height / 2 + offsetY;

  await humanMove(page, clickX, clickY);
  await humanDelay(100, 300);
  await page.mouse.click(clickX, clickY);
  await humanDelay(200, 500);
}

export async function humanType(locator: Locator, text: string): Promise<void> {
  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (Math.random() < 0.05 && i > 0) {
      await humanDelay(300, 800);
    }

    await locator.pressSequentially(char, {
      delay: randomBetween(HUMAN_CONFIG.minTypeDelay, HUMAN_CONFIG.maxTypeDelay),
    });

    if (['.', ',', '!', '?', ';', ':'].includes(char)) {
      await humanDelay(100, 250);
    }
  }
}

export async function humanScrollToElement(page: Page, locator: Locator): Promise<void> {
  await locator.scrollIntoViewIfNeeded();
  await humanDelay(300, 600);

  const extraScroll = randomBetween(-50, 50);
  if (extraScroll !== 0) {
    await page.mouse.wheel(0, extraScroll);
    await humanDelay(200, 400);
  }
}

export async function humanFillInput(page: Page, locator: Locator, value: string): Promise<void> {
  await humanScrollToElement(page, locator);
  await humanClick(page, locator);
  await locator.clear();
  await humanDelay(100, 200);
  await humanType(locator, value);
}

export async function humanSelectOption(page: Page, locator: Locator, value: string): Promise<void> {
  await humanScrollToElement(page, locator);
  await humanDelay(200, 400);
  await locator.selectOption(value);
  await humanDelay(200, 400);
}

export async function humanUploadFile(locator: Locator, filePath: string): Promise<void> {
  await humanDelay(300, 600);
  await locator.setInputFiles(filePath);
  await humanDelay(500, 1000);
}

export async function humanBreakBetweenApplications(): Promise<void> {
  await humanDelay(HUMAN_CONFIG.breakBetweenApplicationsMin, HUMAN_CONFIG.breakBetweenApplicationsMax);
}
