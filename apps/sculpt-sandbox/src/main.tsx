import React, { useCallback, useEffect, useMemo, useRef, useState } from "react";
import { createRoot } from "react-dom/client";
import { describeError } from "@facesculpt/command-core";
import type { InterpreterError } from "@facesculpt/command-core";
import { CommandConnection, defaultConnectionUrl } from "@facesculpt/command-socket";
import type { ConnectionStatus } from "@facesculpt/command-socket";
import { CameraRigController } from "@facesculpt/control-core";
import { MessageQueue } from "@facesculpt/placement-core";
import type { FrameDriver, InputSink, PlacedShapeSnapshot } from "@facesculpt/placement-core";
import { SculptCanvas } from "@facesculpt/scene-three";
import type { ShapeMesh } from "@facesculpt/scene-three";

type ErrorLogEntry = { id: number; at: number; message: string };

const ERROR_LOG_LIMIT = 25;

function trackerUrl(): string {
  if (typeof window === "undefined") return defaultConnectionUrl;
  return new URLSearchParams(window.location.search).get("ws") ?? defaultConnectionUrl;
}

function useTrackerConnection(url: string, queue: MessageQueue): ConnectionStatus {
  const [status, setStatus] = useState<ConnectionStatus>("connecting");

  useEffect(() => {
    const connection = new CommandConnection({ url, queue, onStatus: setStatus });
    connection.open();
    return () => connection.close();
  }, [url, queue]);

  return status;
}

function createDomInputSink(getTarget: () => HTMLElement | null): InputSink {
  return {
    dispatchPointer(phase, cursor) {
      const target = getTarget();
      if (!target) return;
      const rect = target.getBoundingClientRect();
      const clientX = rect.left + (rect.width * cursor.xPct) / 100;
      const clientY = rect.top + (rect.height * cursor.yPct) / 100;
      const hit = document.elementFromPoint(clientX, clientY) ?? target;
      const init: PointerEventInit = { clientX, clientY, bubbles: true, cancelable: true, pointerType: "mouse" };
      hit.dispatchEvent(new PointerEvent(phase === "press" ? "pointerdown" : "pointerup", init));
      if (phase === "release") {
        hit.dispatchEvent(new MouseEvent("click", init));
      }
    },
  };
}

function App() {
  const rig = useMemo(
    () =>
      new CameraRigController({
        initialPosition: [0, 0, 5],
        lerpCoefficient: 4,
        slerpCoefficient: 4,
        translationScale: 0.1,
        rotationScale: 0.05,
      }),
    []
  );
  const queue = useMemo(() => new MessageQueue(), []);
  const url = useMemo(trackerUrl, []);
  const status = useTrackerConnection(url, queue);
  const containerRef = useRef<HTMLDivElement>(null);
  const inputSink = useMemo(() => createDomInputSink(() => containerRef.current), []);
  const [driver, setDriver] = useState<FrameDriver<ShapeMesh> | null>(null);
  const [placed, setPlaced] = useState<PlacedShapeSnapshot[]>([]);
  const [errorLog, setErrorLog] = useState<ErrorLogEntry[]>([]);
  const errorIdRef = useRef(0);

  const handleError = useCallback((err: InterpreterError) => {
    if (err.type === "missing-active-shape") return;
    const entry = { id: ++errorIdRef.current, at: Date.now(), message: describeError(err) };
    setErrorLog((log) => [entry, ...log].slice(0, ERROR_LOG_LIMIT));
  }, []);

  useEffect(() => {
    if (!driver) return;
    const timer = window.setInterval(() => setPlaced(driver.snapshot()), 500);
    return () => window.clearInterval(timer);
  }, [driver]);

  return (
    <div style={{ display: "flex", width: "100vw", height: "100vh", background: "#0b0e14", color: "#e6e6e6" }}>
      <div ref={containerRef} style={{ flex: 1, position: "relative" }}>
        <SculptCanvas
          rig={rig}
          source={queue}
          inputSink={inputSink}
          onError={handleError}
          onDriverReady={setDriver}
        />
      </div>
      <aside style={{ width: 280, padding: 12, fontFamily: "sans-serif", fontSize: 12, overflowY: "auto" }}>
        <div>
          tracker: {url} ({status})
        </div>
        <div>state: {driver?.getSequenceState() ?? "-"}</div>
        <h4>Placed shapes ({placed.length})</h4>
        <ol>
          {placed.map((shape, i) => (
            <li key={i}>
              {shape.kind} @ {shape.position.map((v) => v.toFixed(2)).join(", ")}
            </li>
          ))}
        </ol>
        <h4>Recent problems</h4>
        <ul>
          {errorLog.map((entry) => (
            <li key={entry.id}>{entry.message}</li>
          ))}
        </ul>
      </aside>
    </div>
  );
}

if (typeof document !== "undefined") {
  const rootEl = document.getElementById("root");
  if (rootEl) {
    createRoot(rootEl).render(<App />);
  }
}
