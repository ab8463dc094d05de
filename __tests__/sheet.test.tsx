import { createRef, type ComponentProps } from 'react';
import { act, fireEvent, render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { Sheet, SheetBody, SheetHeader, type SheetHandle } from '@/components/sheet/Sheet';
import { DragController } from '@/components/sheet/dragController';
import { SheetConfigurationError } from '@/components/sheet/errors';
import { fixedSize, fullSize } from '@/components/sheet/sizeSpec';

// jsdom reports window.innerHeight as 768, so full resolves to 768 - 20 - 20
const FULL_HEIGHT = 728;

function pointer(type: string, target: EventTarget, clientY: number, pointerId = 1) {
  const event = Object.assign(new Event(type, { bubbles: true, cancelable: true }), {
    clientX: 100,
    clientY,
    pointerId,
    pointerType: 'touch',
  });
  act(() => {
    target.dispatchEvent(event);
  });
}

function renderSheet(props: Partial<ComponentProps<typeof Sheet>> = {}) {
  const onClose = jest.fn();
  const ref = createRef<SheetHandle>();
  const utils = render(
    <Sheet ref={ref} open onClose={onClose} aria-label="Filters" {...props}>
      <SheetHeader>
        <button type="button">Apply</button>
      </SheetHeader>
      <SheetBody data-testid="sheet-body">
        <p>Results</p>
      </SheetBody>
    </Sheet>
  );
  return { ...utils, onClose, ref };
}

describe('Sheet', () => {
  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('renders its content at the smallest size', () => {
    renderSheet();
    const dialog = screen.getByRole('dialog', { name: 'Filters' });
    expect(dialog).toHaveStyle({ height: '300px' });
    expect(screen.getByText('Results')).toBeInTheDocument();
    expect(screen.getByTestId('sheet-body')).toHaveAttribute('data-sheet-scroll', 'true');
  });

  it('refuses to render without content', () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(() => render(<Sheet open onClose={jest.fn()}>{null}</Sheet>)).toThrow(SheetConfigurationError);
  });

  it('dismisses on a background tap and reports both notifications', () => {
    jest.useFakeTimers();
    const onWillDismiss = jest.fn();
    const onDidDismiss = jest.fn();
    const { onClose, rerender } = renderSheet({ onWillDismiss, onDidDismiss });

    fireEvent.click(screen.getByTestId('sheet-backdrop'));
    expect(onClose).not.toHaveBeenCalled();

    act(() => {
      jest.advanceTimersByTime(350);
    });
    expect(onWillDismiss).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onDidDismiss).not.toHaveBeenCalled();

    rerender(
      <Sheet open={false} onClose={onClose} onWillDismiss={onWillDismiss} onDidDismiss={onDidDismiss}>
        <p>Results</p>
      </Sheet>
    );
    expect(onDidDismiss).toHaveBeenCalledTimes(1);
    expect(screen.queryByRole('dialog')).not.toBeInTheDocument();
  });

  it('ignores background taps when told to', () => {
    jest.useFakeTimers();
    const { onClose } = renderSheet({ dismissOnBackgroundTap: false });

    fireEvent.click(screen.getByTestId('sheet-backdrop'));
    act(() => {
      jest.advanceTimersByTime(350);
    });
    expect(onClose).not.toHaveBeenCalled();
  });

  it('dismisses on Escape', async () => {
    const { onClose } = renderSheet();
    await userEvent.keyboard('{Escape}');
    await waitFor(() => expect(onClose).toHaveBeenCalledTimes(1));
  });

  it('resizes through its imperative handle', () => {
    const { ref } = renderSheet();
    const dialog = screen.getByRole('dialog');

    act(() => {
      ref.current?.resizeTo(fullSize(), false);
    });
    expect(dialog).toHaveStyle({ height: `${FULL_HEIGHT}px` });

    act(() => {
      ref.current?.setSizes([fullSize(), fixedSize(200)]);
    });
    expect(dialog).toHaveStyle({ height: '200px' });
  });

  it('follows a drag on the pull bar and settles on the larger size', () => {
    jest.useFakeTimers();
    renderSheet();
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    pointer('pointermove', pullBar, 100);
    expect(dialog).toHaveStyle({ height: '680px' });
    expect(dialog).toHaveAttribute('data-dragging', 'true');

    pointer('pointerup', pullBar, 100);
    expect(dialog).toHaveStyle({ height: `${FULL_HEIGHT}px` });
    expect(dialog).toHaveAttribute('data-dragging', 'false');
  });

  it('rubber-bands past the smallest size and dismisses on release', () => {
    jest.useFakeTimers();
    const { onClose } = renderSheet();
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 520);
    pointer('pointermove', pullBar, 790);
    expect(dialog).toHaveStyle({ height: '300px', transform: 'translateY(270px)' });

    pointer('pointerup', pullBar, 790);
    act(() => {
      jest.advanceTimersByTime(600);
    });
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('leaves drags inside scrolled content to the content', () => {
    renderSheet();
    const dialog = screen.getByRole('dialog');
    const body = screen.getByTestId('sheet-body');
    jest.spyOn(body, 'getBoundingClientRect').mockReturnValue({
      x: 0, y: 400, top: 400, left: 0, bottom: 700, right: 375, width: 375, height: 300, toJSON: () => ({}),
    });
    Object.defineProperty(body, 'scrollTop', { value: 50, configurable: true });

    pointer('pointerdown', screen.getByText('Results'), 500);
    pointer('pointermove', body, 530);
    pointer('pointermove', body, 700);
    expect(dialog).toHaveStyle({ height: '300px' });
    expect(dialog).toHaveAttribute('data-dragging', 'false');
    pointer('pointerup', body, 700);
  });

  it('does not start a drag from a control', () => {
    renderSheet();
    const dialog = screen.getByRole('dialog');
    const button = screen.getByRole('button', { name: 'Apply' });

    pointer('pointerdown', button, 500);
    pointer('pointermove', button, 300);
    expect(dialog).toHaveStyle({ height: '300px' });
    pointer('pointerup', button, 300);
  });

  it('reverts to the committed height when the pointer is cancelled', () => {
    jest.useFakeTimers();
    renderSheet();
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    pointer('pointermove', pullBar, 300);
    expect(dialog).toHaveStyle({ height: '480px' });

    pointer('pointercancel', document, 300);
    expect(dialog).toHaveStyle({ height: '300px' });
    expect(dialog).toHaveAttribute('data-dragging', 'false');
  });

  it('follows only the pointer that started the drag', () => {
    jest.useFakeTimers();
    const { onClose } = renderSheet();
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    pointer('pointermove', pullBar, 300);

    pointer('pointerdown', document.body, 740, 2);
    pointer('pointermove', document.body, 760, 2);
    pointer('pointerup', document.body, 760, 2);
    expect(dialog).toHaveStyle({ height: '480px' });
    expect(dialog).toHaveAttribute('data-dragging', 'true');

    pointer('pointerup', pullBar, 300);
    act(() => {
      jest.advanceTimersByTime(600);
    });
    expect(dialog).toHaveStyle({ height: `${FULL_HEIGHT}px` });
    expect(onClose).not.toHaveBeenCalled();
  });

  it('cancels a drag cut short by closing, so the reopened sheet still dismisses', () => {
    jest.useFakeTimers();
    const { onClose, rerender } = renderSheet();
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    expect(screen.getByRole('dialog')).toHaveAttribute('data-dragging', 'true');

    rerender(
      <Sheet open={false} onClose={onClose}>
        <p>Results</p>
      </Sheet>
    );
    act(() => {
      jest.advanceTimersByTime(400);
    });
    expect(screen.queryByRole('dialog')).not.toBeInTheDocument();

    rerender(
      <Sheet open onClose={onClose}>
        <p>Results</p>
      </Sheet>
    );
    expect(screen.getByRole('dialog')).toHaveStyle({ height: '300px' });

    fireEvent.click(screen.getByTestId('sheet-backdrop'));
    act(() => {
      jest.advanceTimersByTime(400);
    });
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('keeps dragging when the pointer cannot be captured', () => {
    jest.useFakeTimers();
    renderSheet();
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');
    const capture = jest.fn(() => {
      throw new DOMException('No active pointer with the given id is found.', 'NotFoundError');
    });
    Object.defineProperty(dialog, 'setPointerCapture', { value: capture, configurable: true });

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    pointer('pointermove', pullBar, 100);
    expect(capture).toHaveBeenCalledWith(1);
    expect(dialog).toHaveStyle({ height: '680px' });
    pointer('pointerup', pullBar, 100);
  });

  it('places the pull bar below the content of a top sheet and offsets it upwards', () => {
    renderSheet({ edge: 'top' });
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');
    expect(dialog).toHaveAttribute('data-edge', 'top');
    expect(dialog.lastElementChild).toBe(pullBar);

    pointer('pointerdown', pullBar, 100);
    pointer('pointermove', pullBar, 120);
    pointer('pointermove', pullBar, 0);
    expect(dialog).toHaveStyle({ height: '300px', transform: 'translateY(-120px)' });
    pointer('pointerup', pullBar, 0);
  });

  it('reports the settled height once the transition has run', () => {
    jest.useFakeTimers();
    const settled = jest.spyOn(DragController.prototype, 'settleCompleted');
    renderSheet();
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    pointer('pointermove', pullBar, 100);
    pointer('pointerup', pullBar, 100);
    expect(settled).not.toHaveBeenCalled();

    act(() => {
      jest.advanceTimersByTime(600);
    });
    expect(settled).toHaveBeenCalledTimes(1);
    expect(settled).toHaveBeenCalledWith(FULL_HEIGHT);
  });

  it('picks up a drag mid-settle from the rendered height', () => {
    jest.useFakeTimers();
    const settled = jest.spyOn(DragController.prototype, 'settleCompleted');
    renderSheet();
    const dialog = screen.getByRole('dialog');
    const pullBar = screen.getByTestId('sheet-pull-bar');

    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 480);
    pointer('pointermove', pullBar, 100);
    pointer('pointerup', pullBar, 100);

    jest.spyOn(dialog, 'getBoundingClientRect').mockReturnValue({
      x: 0, y: 168, top: 168, left: 0, bottom: 768, right: 375, width: 375, height: 600, toJSON: () => ({}),
    });
    pointer('pointerdown', pullBar, 500);
    pointer('pointermove', pullBar, 490);
    expect(dialog).toHaveStyle({ height: '600px' });

    act(() => {
      jest.advanceTimersByTime(600);
    });
    expect(settled).not.toHaveBeenCalled();
    pointer('pointerup', pullBar, 490);
  });

  describe('with an on-screen keyboard', () => {
    beforeEach(() => {
      // 300px of keyboard over a 768px window
      Object.defineProperty(window, 'visualViewport', {
        value: Object.assign(new EventTarget(), { height: 468, offsetTop: 0 }),
        configurable: true,
      });
    });

    afterEach(() => {
      Reflect.deleteProperty(window, 'visualViewport');
    });

    it('raises the panel and resolves sizes above the keyboard', () => {
      const { ref } = renderSheet();
      const dialog = screen.getByRole('dialog');
      expect(dialog).toHaveStyle({ bottom: '300px' });

      act(() => {
        ref.current?.resizeTo(fullSize(), false);
      });
      expect(dialog).toHaveStyle({ height: '428px' });
    });

    it('dismisses the keyboard when a drag starts outside the scroll region', () => {
      render(
        <Sheet open onClose={jest.fn()}>
          <SheetBody>
            <input aria-label="Search" />
          </SheetBody>
        </Sheet>
      );
      const input = screen.getByRole('textbox', { name: 'Search' });
      act(() => {
        input.focus();
      });
      expect(input).toHaveFocus();

      const pullBar = screen.getByTestId('sheet-pull-bar');
      pointer('pointerdown', pullBar, 500);
      pointer('pointermove', pullBar, 480);
      expect(input).not.toHaveFocus();
      pointer('pointerup', pullBar, 480);
    });
  });
});
