import { AvlTree } from '../src';
import { checkTree, shapeOf } from './tree-checks';

describe('AVL rotations', () => {
  let tree: AvlTree<number, number>;

  beforeEach(() => {
    tree = new AvlTree<number, number>();
  });

	function insertAll(...entries: number[]) {
		entries.forEach(entry => tree.insert(entry));
	}

	function expectBalancedTriple() {
		const root = tree.root!;
		expect(root.entry).toBe(1);
		expect(root.height).toBe(1);
		expect(root.balanceFactor).toBe(0);
		expect(root.left!.entry).toBe(0);
		expect(root.left!.height).toBe(0);
		expect(root.left!.balanceFactor).toBe(0);
		expect(root.right!.entry).toBe(2);
		expect(root.right!.height).toBe(0);
		expect(root.right!.balanceFactor).toBe(0);
		expect(tree.size()).toBe(3);
	}

	it('single right rotation on left-left insert', () => {
		insertAll(2, 1, 0);
		expectBalancedTriple();
	});

	it('single left rotation on right-right insert', () => {
		insertAll(0, 1, 2);
		expectBalancedTriple();
	});

	it('double rotation on right-left insert', () => {
		insertAll(0, 2, 1);
		expectBalancedTriple();
	});

	it('double rotation on left-right insert', () => {
		insertAll(2, 0, 1);
		expectBalancedTriple();
	});

	it('ascending inserts stay balanced', () => {
		for (let i = 0; i < 7; ++i) {
			tree.insert(i);
		}
		expect(shapeOf(tree.root)).toBe('3(1(0,2),5(4,6))');
		expect(tree.height()).toBe(2);
		expect(checkTree(tree)).toEqual([0, 1, 2, 3, 4, 5, 6]);
	});

	it('rotates right when a removal leaves the left side heavy', () => {
		insertAll(2, 1, 3, 0);
		expect(tree.remove(3)).toBe(3);
		expect(shapeOf(tree.root)).toBe('1(0,2)');
		checkTree(tree);
	});

	it('double rotates when a removal leaves a left-right imbalance', () => {
		insertAll(2, 0, 3, 1);
		expect(shapeOf(tree.root)).toBe('2(0(-,1),3)');
		tree.remove(3);
		expect(shapeOf(tree.root)).toBe('1(0,2)');
		checkTree(tree);
	});

	it('rotates at more than one level during a single removal', () => {
		// Fibonacci-shaped tree: every node leans left
		insertAll(8, 5, 11, 3, 7, 10, 12, 2, 4, 6, 9, 1);
		expect(shapeOf(tree.root)).toBe('8(5(3(2(1,-),4),7(6,-)),11(10(9,-),12))');
		expect(tree.height()).toBe(4);

		tree.remove(12);
		expect(shapeOf(tree.root)).toBe('5(3(2(1,-),4),8(7(6,-),10(9,11)))');
		expect(tree.height()).toBe(3);
		expect(tree.root!.balanceFactor).toBe(0);
		expect(checkTree(tree)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
	});

	it('keeps the node and replaces its entry when removing with two children', () => {
		insertAll(3, 1, 4, 0, 2);
		const formerLeft = tree.root!.left;
		expect(tree.remove(1)).toBe(1);
		expect(tree.root!.left).toBe(formerLeft);
		expect(shapeOf(tree.root)).toBe('3(2(0,-),4)');
		expect(tree.root!.left!.height).toBe(1);
		expect(tree.root!.left!.balanceFactor).toBe(1);
		expect(tree.size()).toBe(4);
		checkTree(tree);
	});
});
