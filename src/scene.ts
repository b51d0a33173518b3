import * as THREE from 'three';
import type { Pose } from './pose';
import type { RenderSink } from './presentation';

/**
 * Scene graph the pose is applied to: a stand-in IMU board at the origin,
 * world axes and a floor grid. Node has no GL context, so drawing is left to
 * whichever renderer is handed `scene`; this sink only keeps the graph's
 * transforms current.
 */
export class SceneSink implements RenderSink {
    public readonly scene: THREE.Scene;
    public readonly model: THREE.Group;

    constructor() {
        this.scene = new THREE.Scene();
        this.scene.background = new THREE.Color(0x333333);

        this.scene.add(new THREE.AxesHelper(5));
        this.scene.add(new THREE.GridHelper(20, 20, 0x444444, 0x444444));

        this.model = createBoardModel();
        this.scene.add(this.model);
    }

    render(pose: Pose) {
        this.model.quaternion.copy(pose.rotation);
        this.model.updateMatrixWorld(true);
    }

    dispose() {
        this.scene.traverse((child) => {
            if (child instanceof THREE.Mesh || child instanceof THREE.LineSegments) {
                child.geometry.dispose();
                const material: THREE.Material | THREE.Material[] = child.material;
                if (Array.isArray(material)) material.forEach((m) => m.dispose());
                else material.dispose();
            }
        });
    }
}

function createBoardModel(): THREE.Group {
    const model = new THREE.Group();
    model.name = 'imu-board';

    // Board
    const board = new THREE.Mesh(
        new THREE.BoxGeometry(4, 0.1, 2.5),
        new THREE.MeshPhongMaterial({ color: 0x2d5016, shininess: 20, specular: 0x111111 })
    );
    model.add(board);

    // MCU
    const chip = new THREE.Mesh(
        new THREE.BoxGeometry(1.5, 0.2, 1),
        new THREE.MeshPhongMaterial({ color: 0x1a1a1a, shininess: 50, specular: 0x333333 })
    );
    chip.position.set(-0.5, 0.15, 0);
    model.add(chip);

    // IMU package, with the sensor axes drawn at its location
    const sensor = new THREE.Mesh(
        new THREE.BoxGeometry(0.3, 0.15, 0.3),
        new THREE.MeshPhongMaterial({ color: 0xc0c0c0, shininess: 100, specular: 0x888888 })
    );
    sensor.position.set(1, 0.125, 0.5);
    model.add(sensor);

    const axes = new THREE.AxesHelper(1);
    axes.position.set(1, 0.2, 0.5);
    model.add(axes);

    return model;
}
