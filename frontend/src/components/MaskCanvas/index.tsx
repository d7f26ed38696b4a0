import { forwardRef, useCallback, useEffect, useImperativeHandle, useRef } from 'react';
import type { PointerEvent as ReactPointerEvent } from 'react';
import { getCanvas2DContext } from '@/utils/canvas';
import styles from './MaskCanvas.module.css';

export interface MaskCanvasHandle {
  /** Transparent layer holding only the strokes */
  getStrokes: () => HTMLCanvasElement | null;
  clear: () => void;
}

interface MaskCanvasProps {
  /** Image drawn under the strokes */
  backgroundUrl: string;
  width: number;
  height: number;
  strokeWidth: number;
  disabled?: boolean;
}

const STROKE_COLOR = 'rgba(0, 0, 0, 1.0)';

/**
 * Freehand mask drawing over an image.
 * The canvas keeps the image's pixel size and is scaled down by CSS.
 */
export const MaskCanvas = forwardRef<MaskCanvasHandle, MaskCanvasProps>(function MaskCanvas(
  { backgroundUrl, width, height, strokeWidth, disabled },
  ref,
) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const drawingRef = useRef(false);
  const lastPointRef = useRef<{ x: number; y: number } | null>(null);

  const clear = useCallback(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    getCanvas2DContext(canvas).clearRect(0, 0, canvas.width, canvas.height);
  }, []);

  useImperativeHandle(ref, () => ({ getStrokes: () => canvasRef.current, clear }), [clear]);

  // a new image starts a new mask
  useEffect(() => {
    clear();
  }, [backgroundUrl, width, height, clear]);

  // pointer position in canvas pixels
  const toCanvasPoint = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    const canvas = event.currentTarget;
    const rect = canvas.getBoundingClientRect();
    const scaleX = canvas.width / (rect.width || 1);
    const scaleY = canvas.height / (rect.height || 1);
    return {
      x: (event.clientX - rect.left) * scaleX,
      y: (event.clientY - rect.top) * scaleY,
    };
  };

  const drawSegment = (canvas: HTMLCanvasElement, from: { x: number; y: number }, to: { x: number; y: number }) => {
    const ctx = getCanvas2DContext(canvas);
    ctx.strokeStyle = STROKE_COLOR;
    ctx.fillStyle = STROKE_COLOR;
    ctx.lineWidth = strokeWidth;
    ctx.lineCap = 'round';
    ctx.lineJoin = 'round';
    if (from.x === to.x && from.y === to.y) {
      ctx.beginPath();
      ctx.arc(to.x, to.y, strokeWidth / 2, 0, Math.PI * 2);
      ctx.fill();
      return;
    }
    ctx.beginPath();
    ctx.moveTo(from.x, from.y);
    ctx.lineTo(to.x, to.y);
    ctx.stroke();
  };

  const handlePointerDown = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    if (disabled) return;
    event.currentTarget.setPointerCapture(event.pointerId);
    drawingRef.current = true;
    const point = toCanvasPoint(event);
    lastPointRef.current = point;
    drawSegment(event.currentTarget, point, point);
  };

  const handlePointerMove = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    if (!drawingRef.current || disabled) return;
    const point = toCanvasPoint(event);
    drawSegment(event.currentTarget, lastPointRef.current ?? point, point);
    lastPointRef.current = point;
  };

  const handlePointerUp = (event: ReactPointerEvent<HTMLCanvasElement>) => {
    drawingRef.current = false;
    lastPointRef.current = null;
    if (event.currentTarget.hasPointerCapture(event.pointerId)) {
      event.currentTarget.releasePointerCapture(event.pointerId);
    }
  };

  return (
    <div className={styles.stage} style={{ aspectRatio: `${width} / ${height}`, maxWidth: width }}>
      <img src={backgroundUrl} alt="Image to edit" className={styles.background} draggable={false} />
      <canvas
        ref={canvasRef}
        width={width}
        height={height}
        className={styles.strokes}
        onPointerDown={handlePointerDown}
        onPointerMove={handlePointerMove}
        onPointerUp={handlePointerUp}
        onPointerCancel={handlePointerUp}
      />
    </div>
  );
});
