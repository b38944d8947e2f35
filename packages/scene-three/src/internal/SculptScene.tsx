import React, { useEffect, useRef } from "react";
import { useFrame, useThree } from "@react-three/fiber";
import * as THREE from "three";
import type { InterpreterError } from "@facesculpt/command-core";
import type { CameraRigController } from "@facesculpt/control-core";
import { FrameDriver } from "@facesculpt/placement-core";
import type { InputSink, InterpreterConfig, MessageSource } from "@facesculpt/placement-core";
import { ThreeSceneCollaborator } from "../ThreeSceneCollaborator";
import type { ShapeMesh, ThreeSceneOptions } from "../ThreeSceneCollaborator";

export interface SculptSceneProps {
  rig: CameraRigController;
  source: MessageSource;
  /** Read once when the driver is built; later changes need a remount. */
  config?: InterpreterConfig;
  inputSink?: InputSink;
  /** Read once when the driver is built, like `config`. */
  shapeOptions?: ThreeSceneOptions;
  onError?: (err: InterpreterError) => void;
  onDriverReady?: (driver: FrameDriver<ShapeMesh> | null) => void;
  showCursor?: boolean;
}

export function SculptScene(props: SculptSceneProps) {
  const { rig, source, showCursor = true } = props;
  const { camera } = useThree();
  const groupRef = useRef<THREE.Group>(null);
  const cursorRef = useRef<THREE.Mesh>(null);
  const driverRef = useRef<FrameDriver<ShapeMesh> | null>(null);
  // Callbacks and options may change identity every render; the driver keeps its state.
  const propsRef = useRef(props);
  propsRef.current = props;

  useEffect(() => {
    const group = groupRef.current;
    if (!group) return;
    const { config, shapeOptions } = propsRef.current;
    const collaborator = new ThreeSceneCollaborator(group, shapeOptions);
    const driver = new FrameDriver<ShapeMesh>({
      camera,
      rig,
      scene: collaborator,
      source,
      config,
      inputSink: {
        dispatchPointer: (phase, cursor) => propsRef.current.inputSink?.dispatchPointer(phase, cursor),
      },
      onError: (err) => propsRef.current.onError?.(err),
    });
    driverRef.current = driver;
    propsRef.current.onDriverReady?.(driver);
    return () => {
      driverRef.current = null;
      collaborator.clear();
      propsRef.current.onDriverReady?.(null);
    };
  }, [camera, rig, source]);

  useFrame((_state, delta) => {
    const driver = driverRef.current;
    if (!driver) return;
    driver.tick(delta);
    if (cursorRef.current) {
      cursorRef.current.position.copy(driver.getCursorWorldPoint());
    }
  });

  return (
    <>
      <group ref={groupRef} />
      {showCursor && (
        <mesh ref={cursorRef}>
          <sphereGeometry args={[0.05, 16, 8]} />
          <meshBasicMaterial color="#00c2ff" transparent opacity={0.8} />
        </mesh>
      )}
    </>
  );
}
