import { useCallback, useEffect, useRef, useState } from 'react';
import type { PointerEvent as ReactPointerEvent } from 'react';

import { CANVAS_HEIGHT, CANVAS_WIDTH } from '../model/config';
import { renderCloth } from '../model/render';
import type { Cloth, ClothDriver, DragState, Vec2 } from '../model/types';

type ClothCanvasProps = {
  driver: ClothDriver;
  cloth: Cloth;
  drag: DragState;
  renderNonce: number;
};

function getCanvasPoint(event: ReactPointerEvent<HTMLCanvasElement>, canvas: HTMLCanvasElement): Vec2 {
  const rect = canvas.getBoundingClientRect();
  return {
    x: event.clientX - rect.left,
    y: event.clientY - rect.top
  };
}

export function ClothCanvas({ driver, cloth, drag, renderNonce }: ClothCanvasProps): JSX.Element {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const activePointerIdRef = useRef<number | null>(null);
  const [viewport, setViewport] = useState({ width: CANVAS_WIDTH, height: CANVAS_HEIGHT });

  const resizeCanvas = useCallback(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const rect = canvas.getBoundingClientRect();
    const cssWidth = Math.max(1, Math.round(rect.width || CANVAS_WIDTH));
    const cssHeight = Math.max(1, Math.round(rect.height || CANVAS_HEIGHT));
    const dpr = window.devicePixelRatio || 1;

    canvas.width = Math.round(cssWidth * dpr);
    canvas.height = Math.round(cssHeight * dpr);

    const ctx = canvas.getContext('2d');
    if (!ctx) {
      return;
    }

    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);

    setViewport((prev) => {
      if (prev.width === cssWidth && prev.height === cssHeight) {
        return prev;
      }
      return {
        width: cssWidth,
        height: cssHeight
      };
    });
  }, []);

  useEffect(() => {
    resizeCanvas();
    window.addEventListener('resize', resizeCanvas);
    return () => {
      window.removeEventListener('resize', resizeCanvas);
    };
  }, [resizeCanvas]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const ctx = canvas.getContext('2d');
    if (!ctx) {
      return;
    }

    renderCloth(ctx, viewport.width, viewport.height, cloth, drag);
  }, [cloth, drag, viewport.height, viewport.width, renderNonce]);

  const handlePointerDown = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas || event.button !== 0) {
        return;
      }
      if (activePointerIdRef.current !== null) {
        return;
      }

      const result = driver.onPointerDown(getCanvasPoint(event, canvas));
      if (!result.ok) {
        return;
      }

      activePointerIdRef.current = event.pointerId;
      canvas.setPointerCapture(event.pointerId);
    },
    [driver]
  );

  const handlePointerMove = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas || activePointerIdRef.current !== event.pointerId) {
        return;
      }
      driver.onPointerDrag(getCanvasPoint(event, canvas));
    },
    [driver]
  );

  const finishInteraction = useCallback(
    (event: ReactPointerEvent<HTMLCanvasElement>) => {
      const canvas = canvasRef.current;
      if (!canvas || activePointerIdRef.current !== event.pointerId) {
        return;
      }

      driver.onPointerUp();
      canvas.releasePointerCapture(event.pointerId);
      activePointerIdRef.current = null;
    },
    [driver]
  );

  return (
    <canvas
      ref={canvasRef}
      data-testid="cloth-canvas"
      className="cloth-canvas"
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={finishInteraction}
      onPointerCancel={finishInteraction}
    />
  );
}
