import { ClassificationError } from '../src/errors';
import { classifyInput } from '../src/services/inputClassifier';
import type { StoredFile } from '../src/types/bundle';

const stored = (...names: string[]): StoredFile[] =>
  names.map((name, index) => ({ name, ref: `uploads/${index}-${name.replace(/\//g, '_')}` }));

function classificationError(files: StoredFile[]): ClassificationError {
  try {
    classifyInput(files);
  } catch (error) {
    if (error instanceof ClassificationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected classification to fail.');
}

describe('classifyInput', () => {
  describe('single-file formats', () => {
    it('classifies an ONNX file', () => {
      const bundle = classifyInput(stored('mobilenet.onnx'));

      expect(bundle.format).toBe('onnx');
      expect(bundle.stem).toBe('mobilenet');
      expect(bundle.primaryRole).toBe('model');
      expect(bundle.primaryFile.ref).toBe('uploads/0-mobilenet.onnx');
      expect(bundle.shards).toEqual([]);
    });

    it('matches extensions case-insensitively', () => {
      const bundle = classifyInput(stored('RESNET.ONNX'));

      expect(bundle.format).toBe('onnx');
      expect(bundle.stem).toBe('RESNET');
    });

    it('uses only the basename of nested names', () => {
      const bundle = classifyInput(stored('export/detector.tflite'));

      expect(bundle.format).toBe('tflite');
      expect(bundle.stem).toBe('detector');
      expect(bundle.primaryFile.name).toBe('export/detector.tflite');
    });

    it.each([
      ['traced.pt', 'pytorch'],
      ['traced.pth', 'pytorch'],
      ['frozen_graph.pb', 'tensorflow_frozen']
    ])('classifies %s as %s', (name, format) => {
      expect(classifyInput(stored(name)).format).toBe(format);
    });
  });

  describe('multi-file formats', () => {
    it('groups a Caffe graph with its weights and ignores documentation', () => {
      const bundle = classifyInput(stored('deploy.prototxt', 'deploy.caffemodel', 'README.md'));

      expect(bundle.format).toBe('caffe');
      expect(bundle.stem).toBe('deploy');
      expect(bundle.roles.graph?.name).toBe('deploy.prototxt');
      expect(bundle.roles.weights?.name).toBe('deploy.caffemodel');
      expect(bundle.primaryFile.name).toBe('deploy.prototxt');
    });

    it('groups a Darknet config with its weights', () => {
      const bundle = classifyInput(stored('yolov3.weights', 'yolov3.cfg', 'coco.names'));

      expect(bundle.format).toBe('darknet');
      expect(bundle.primaryRole).toBe('config');
      expect(bundle.primaryFile.name).toBe('yolov3.cfg');
    });

    it('orders checkpoint shards and drops the .ckpt suffix from the stem', () => {
      const bundle = classifyInput(
        stored(
          'model.ckpt.meta',
          'model.ckpt.index',
          'model.ckpt.data-00001-of-00002',
          'model.ckpt.data-00000-of-00002',
          'checkpoint'
        )
      );

      expect(bundle.format).toBe('tensorflow_checkpoint');
      expect(bundle.stem).toBe('model');
      expect(bundle.primaryRole).toBe('meta');
      expect(bundle.shards.map((shard) => shard.name)).toEqual([
        'model.ckpt.data-00000-of-00002',
        'model.ckpt.data-00001-of-00002'
      ]);
      expect(bundle.roles.data?.name).toBe('model.ckpt.data-00000-of-00002');
    });

    it('accepts the optional .ckpt alias of a checkpoint', () => {
      const bundle = classifyInput(
        stored('model.ckpt', 'model.ckpt.meta', 'model.ckpt.index', 'model.ckpt.data-00000-of-00001')
      );

      expect(bundle.format).toBe('tensorflow_checkpoint');
      expect(bundle.roles.alias?.name).toBe('model.ckpt');
    });

    it('reports a gap in the shard set as a missing data role', () => {
      const error = classificationError(
        stored('model.meta', 'model.index', 'model.data-00000-of-00003', 'model.data-00002-of-00003')
      );

      expect(error.kind).toBe('MissingRole');
      expect(error.missingRoles).toEqual(['data']);
    });

    it('classifies a SavedModel directory', () => {
      const bundle = classifyInput(
        stored(
          'my_model/saved_model.pb',
          'my_model/variables/variables.index',
          'my_model/variables/variables.data-00000-of-00001'
        )
      );

      expect(bundle.format).toBe('tensorflow_savedmodel');
      expect(bundle.stem).toBe('my_model');
      expect(bundle.primaryRole).toBe('graph');
      expect(bundle.primaryFile.name).toBe('my_model/saved_model.pb');
      expect(bundle.shards).toHaveLength(1);
    });

    it('requires the variables of a SavedModel', () => {
      const error = classificationError(stored('saved_model.pb', 'variables.index'));

      expect(error.kind).toBe('MissingRole');
      expect(error.missingRoles).toEqual(['data']);
    });
  });

  describe('rejections', () => {
    it('rejects an incomplete Caffe model', () => {
      const error = classificationError(stored('deploy.prototxt'));

      expect(error.kind).toBe('MissingRole');
      expect(error.missingRoles).toEqual(['weights']);
      expect(error.message).toBe('Model files are incomplete, missing: weights');
    });

    it('collects missing roles across groups with different stems', () => {
      const error = classificationError(stored('a.prototxt', 'b.caffemodel'));

      expect(error.kind).toBe('MissingRole');
      expect(error.missingRoles).toEqual(['weights', 'graph']);
    });

    it('rejects two models in one upload', () => {
      const error = classificationError(stored('a.onnx', 'b.onnx'));

      expect(error.kind).toBe('AmbiguousInput');
      expect(error.message).toBe('More than one model found: a (ONNX), b (ONNX)');
    });

    it('rejects models of different formats uploaded together', () => {
      const error = classificationError(stored('net.onnx', 'deploy.prototxt', 'deploy.caffemodel'));

      expect(error.kind).toBe('AmbiguousInput');
    });

    it('rejects a model with unrelated model files next to it', () => {
      const error = classificationError(stored('net.onnx', 'orphan.prototxt'));

      expect(error.kind).toBe('AmbiguousInput');
      expect(error.files).toEqual(['orphan.prototxt']);
    });

    it('rejects a SavedModel mixed with another model', () => {
      const error = classificationError(
        stored('saved_model.pb', 'variables.index', 'variables.data-00000-of-00001', 'net.onnx')
      );

      expect(error.kind).toBe('AmbiguousInput');
      expect(error.files).toEqual(['net.onnx']);
    });

    it('rejects two files for the same role', () => {
      const error = classificationError(stored('net.prototxt', 'copy/net.prototxt', 'net.caffemodel'));

      expect(error.kind).toBe('AmbiguousInput');
    });

    it('rejects unknown file types', () => {
      const error = classificationError(stored('model.h5'));

      expect(error.kind).toBe('UnsupportedFormat');
      expect(error.files).toEqual(['model.h5']);
    });

    it('rejects an empty upload', () => {
      expect(classificationError([]).kind).toBe('UnsupportedFormat');
    });

    it('rejects an upload without any model file', () => {
      expect(classificationError(stored('README.md', 'labels.txt')).kind).toBe('UnsupportedFormat');
    });
  });
});
